import { TaskFilterOptions } from '../interfaces/task-results.interface';
import { ensureValid, validateDateRange } from '../validation/task.validators';
import { TaskFilter, TaskFilters } from './task-filter';

/**
 * ANDs the caller's access scope with the explicit filters from the
 * request. Rejects a malformed or inverted due-date range.
 */
export function composeTaskFilter(scope: TaskFilter, options: TaskFilterOptions): TaskFilter {
  ensureValid(validateDateRange(options.startDate, options.endDate));

  const equality: TaskFilter[] = [];
  if (options.status) {
    equality.push(TaskFilters.eq('status', options.status));
  }
  if (options.priority) {
    equality.push(TaskFilters.eq('priority', options.priority));
  }
  if (options.assignedTo) {
    equality.push(TaskFilters.eq('assignedTo', options.assignedTo));
  }
  if (options.createdBy) {
    equality.push(TaskFilters.eq('createdBy', options.createdBy));
  }

  return TaskFilters.and(
    scope,
    ...equality,
    TaskFilters.dueDateBetween(options.startDate, options.endDate),
  );
}
