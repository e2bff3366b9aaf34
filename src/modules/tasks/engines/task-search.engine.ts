import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../../../common/services/clock.service';
import { Task } from '../entities/task.entity';
import {
  PaginatedTaskResponse,
  TaskFilterOptions,
} from '../interfaces/task-results.interface';
import { toTaskResponse, wellFormedTasks } from '../mappers/task.mapper';
import { composeTaskFilter } from '../query/compose-filter';
import { buildPaginationInfo, resolvePageRequest } from '../query/pagination';
import { TaskFilter } from '../query/task-filter';
import { resolveTaskSort, sortTasks } from '../query/task-sort';
import type { ITasksRepository } from '../tasks.repository.interface';
import { TASKS_REPOSITORY } from '../tasks.repository.interface';

export function matchesSearchText(task: Task, needle: string): boolean {
  return (
    task.title.toLowerCase().includes(needle) || task.description.toLowerCase().includes(needle)
  );
}

/**
 * Case-insensitive substring search over title and description. The store
 * has no text index, so the scoped candidate set is streamed and matched,
 * sorted and paged in memory.
 */
@Injectable()
export class TaskSearchEngine {
  private readonly logger = new Logger(TaskSearchEngine.name);

  constructor(
    @Inject(TASKS_REPOSITORY)
    private readonly tasksRepository: ITasksRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /** `query` must already have passed validateSearchQuery. */
  async search(
    scope: TaskFilter,
    query: string,
    options: TaskFilterOptions = {},
  ): Promise<PaginatedTaskResponse> {
    const needle = query.trim().toLowerCase();
    const filter = composeTaskFilter(scope, options);
    const { page, pageSize, skip } = resolvePageRequest(options, this.logger);
    const sort = resolveTaskSort(options.sortBy, options.sortOrder);

    const matched: Task[] = [];
    let scanned = 0;
    for await (const task of wellFormedTasks(this.tasksRepository.find(filter), this.logger)) {
      scanned++;
      if (matchesSearchText(task, needle)) {
        matched.push(task);
      }
    }

    this.logger.debug(`Search "${needle}" matched ${matched.length} of ${scanned} candidates`);

    const sorted = sortTasks(matched, sort);
    const end = Math.min(skip + pageSize, sorted.length);
    const today = this.clock.today();

    return {
      tasks: sorted.slice(skip, end).map(task => toTaskResponse(task, today)),
      pagination: buildPaginationInfo(page, pageSize, sorted.length),
    };
  }
}
