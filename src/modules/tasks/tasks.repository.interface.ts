import { Task } from './entities/task.entity';
import { TaskFilter } from './query/task-filter';
import { TaskSort } from './query/task-sort';

export interface TaskFindOptions {
  sort?: TaskSort;
  skip?: number;
  limit?: number;
}

export type NewTask = Omit<Task, 'id'>;

/** Fields a stored task may change after creation; `createdBy` is not one of them. */
export type TaskChanges = Partial<
  Pick<
    Task,
    | 'title'
    | 'description'
    | 'status'
    | 'priority'
    | 'dueDate'
    | 'assignedTo'
    | 'timezone'
    | 'updatedAt'
  >
>;

/**
 * Document-style access to the task collection. Single-document writes are
 * atomic; nothing spans documents.
 */
export interface ITasksRepository {
  /** Streams matching tasks; ties in `sort` keep insertion order. */
  find(filter: TaskFilter, options?: TaskFindOptions): AsyncIterable<Task>;

  count(filter: TaskFilter): Promise<number>;

  findOne(filter: TaskFilter): Promise<Task | null>;

  insert(task: NewTask): Promise<Task>;

  /** Returns the number of tasks changed (0 or 1). */
  updateOne(filter: TaskFilter, changes: TaskChanges): Promise<number>;

  /** Returns the number of tasks removed (0 or 1). */
  deleteOne(filter: TaskFilter): Promise<number>;
}

export const TASKS_REPOSITORY = Symbol('TASKS_REPOSITORY');
