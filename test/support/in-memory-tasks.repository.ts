import { randomUUID } from 'node:crypto';
import { Task } from '../../src/modules/tasks/entities/task.entity';
import { TaskFilter } from '../../src/modules/tasks/query/task-filter';
import { sortTasks } from '../../src/modules/tasks/query/task-sort';
import { withStorableIds } from '../../src/modules/tasks/tasks.repository';
import {
  ITasksRepository,
  NewTask,
  TaskChanges,
  TaskFindOptions,
} from '../../src/modules/tasks/tasks.repository.interface';

export function matchesFilter(task: Task, filter: TaskFilter): boolean {
  switch (filter.kind) {
    case 'all':
      return true;
    case 'eq':
      return task[filter.field] === filter.value;
    case 'dueDateRange':
      return (
        (filter.from === undefined || task.dueDate >= filter.from) &&
        (filter.to === undefined || task.dueDate <= filter.to)
      );
    case 'and':
      return filter.filters.every(child => matchesFilter(task, child));
    case 'or':
      return filter.filters.some(child => matchesFilter(task, child));
  }
}

/** Same id handling as the Postgres store: non-UUID ids match nothing. */
function matchesStored(task: Task, filter: TaskFilter): boolean {
  return matchesFilter(task, withStorableIds(filter));
}

function copy(task: Task): Task {
  return Object.assign(new Task(), task);
}

/**
 * Task store kept in insertion order, honouring the repository contract
 * closely enough for engine and service tests.
 */
export class InMemoryTasksRepository implements ITasksRepository {
  private readonly tasks: Task[] = [];

  /** Stores a task as-is, bypassing insert (used for malformed records). */
  seed(...tasks: Task[]): void {
    this.tasks.push(...tasks.map(copy));
  }

  snapshot(): Task[] {
    return this.tasks.map(copy);
  }

  async *find(filter: TaskFilter, options: TaskFindOptions = {}): AsyncIterable<Task> {
    let matched = this.tasks.filter(task => matchesStored(task, filter));
    if (options.sort) {
      matched = sortTasks(matched, options.sort);
    }

    const start = options.skip ?? 0;
    const end = options.limit === undefined ? matched.length : start + options.limit;

    for (const task of matched.slice(start, end)) {
      yield copy(task);
    }
  }

  async count(filter: TaskFilter): Promise<number> {
    return this.tasks.filter(task => matchesStored(task, filter)).length;
  }

  async findOne(filter: TaskFilter): Promise<Task | null> {
    const task = this.tasks.find(candidate => matchesStored(candidate, filter));
    return task ? copy(task) : null;
  }

  async insert(task: NewTask): Promise<Task> {
    const stored = Object.assign(new Task(), task, { id: randomUUID() });
    this.tasks.push(stored);
    return copy(stored);
  }

  async updateOne(filter: TaskFilter, changes: TaskChanges): Promise<number> {
    const task = this.tasks.find(candidate => matchesStored(candidate, filter));
    if (!task) {
      return 0;
    }
    Object.assign(task, changes);
    return 1;
  }

  async deleteOne(filter: TaskFilter): Promise<number> {
    const index = this.tasks.findIndex(candidate => matchesStored(candidate, filter));
    if (index === -1) {
      return 0;
    }
    this.tasks.splice(index, 1);
    return 1;
  }
}
