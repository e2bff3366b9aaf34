import { TaskStatus } from '../enums/task-status.enum';

/**
 * A task is overdue when it is not done and its due date is strictly
 * before today. Both dates are YYYY-MM-DD, so string order is date order.
 */
export function isOverdue(status: TaskStatus, dueDate: string, today: string): boolean {
  return status !== TaskStatus.DONE && dueDate < today;
}
