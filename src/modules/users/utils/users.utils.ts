import { UserRole } from '../enum/user-role.enum';

/**
 * Checks if a role carries the admin capability (unrestricted task visibility)
 *
 * @example
 * if (isAdmin(currentUser.role)) {
 *   // Allow access to global data
 * }
 */
export function isAdmin(role: string): boolean {
  return role === UserRole.ADMIN;
}
