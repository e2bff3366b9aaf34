import { Task } from '../entities/task.entity';
import { TaskPriority } from '../enums/task-priority.enum';
import { SortOrder, TaskSortField } from '../enums/task-sort.enum';

export interface TaskSort {
  field: TaskSortField;
  order: SortOrder;
}

export const DEFAULT_TASK_SORT: TaskSort = {
  field: TaskSortField.CREATED_AT,
  order: SortOrder.DESC,
};

export const PRIORITY_ORDINAL: Record<TaskPriority, number> = {
  [TaskPriority.LOW]: 1,
  [TaskPriority.MEDIUM]: 2,
  [TaskPriority.HIGH]: 3,
};

function sortKey(task: Task, field: TaskSortField): string | number {
  switch (field) {
    case TaskSortField.PRIORITY:
      return PRIORITY_ORDINAL[task.priority];
    case TaskSortField.CREATED_AT:
      return task.createdAt.getTime();
    case TaskSortField.UPDATED_AT:
      return task.updatedAt.getTime();
    case TaskSortField.DUE_DATE:
      return task.dueDate;
    case TaskSortField.STATUS:
      return task.status;
    case TaskSortField.TITLE:
      return task.title;
  }
}

/**
 * Comparator for a single sort key. Equal keys compare as 0 so that a
 * stable sort keeps retrieval order for ties. Strings compare by code unit,
 * the order the store gets from `COLLATE "C"`.
 */
export function compareTasks(sort: TaskSort): (a: Task, b: Task) => number {
  const direction = sort.order === SortOrder.ASC ? 1 : -1;

  return (a, b) => {
    const left = sortKey(a, sort.field);
    const right = sortKey(b, sort.field);

    if (left < right) {
      return -direction;
    }
    if (left > right) {
      return direction;
    }
    return 0;
  };
}

/** Returns a sorted copy; Array.prototype.sort is stable. */
export function sortTasks(tasks: readonly Task[], sort: TaskSort): Task[] {
  return [...tasks].sort(compareTasks(sort));
}

export function resolveTaskSort(sortBy?: TaskSortField, sortOrder?: SortOrder): TaskSort {
  return {
    field: sortBy ?? DEFAULT_TASK_SORT.field,
    order: sortOrder ?? DEFAULT_TASK_SORT.order,
  };
}
