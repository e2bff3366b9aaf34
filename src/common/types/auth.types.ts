export interface AuthUser {
  id: string;
  role: string;
}
