import { Task } from '../entities/task.entity';
import { TaskFilter, TaskFilters } from './task-filter';

/**
 * Visibility predicate for a caller: admins see every task, everyone else
 * sees the tasks they created or are assigned to. Every read path ANDs this
 * into its own filter.
 */
export function resolveAccessScope(callerId: string, isAdmin: boolean): TaskFilter {
  if (isAdmin) {
    return TaskFilters.all();
  }

  return TaskFilters.or(
    TaskFilters.eq('createdBy', callerId),
    TaskFilters.eq('assignedTo', callerId),
  );
}

/** Same rule as resolveAccessScope, applied to a single loaded task. */
export function canViewTask(
  task: Pick<Task, 'createdBy' | 'assignedTo'>,
  callerId: string,
  isAdmin: boolean,
): boolean {
  return isAdmin || task.createdBy === callerId || task.assignedTo === callerId;
}
