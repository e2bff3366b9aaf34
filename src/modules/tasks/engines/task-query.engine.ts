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
import { resolveTaskSort } from '../query/task-sort';
import type { ITasksRepository } from '../tasks.repository.interface';
import { TASKS_REPOSITORY } from '../tasks.repository.interface';

/**
 * Filtered, sorted and paginated listing pushed down to the store.
 * Totals come from a separate count over the same filter.
 */
@Injectable()
export class TaskQueryEngine {
  private readonly logger = new Logger(TaskQueryEngine.name);

  constructor(
    @Inject(TASKS_REPOSITORY)
    private readonly tasksRepository: ITasksRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  async list(scope: TaskFilter, options: TaskFilterOptions = {}): Promise<PaginatedTaskResponse> {
    const filter = composeTaskFilter(scope, options);
    const { page, pageSize, skip } = resolvePageRequest(options, this.logger);
    const sort = resolveTaskSort(options.sortBy, options.sortOrder);

    this.logger.debug(
      `Listing tasks page=${page} pageSize=${pageSize} sort=${sort.field}:${sort.order}`,
    );

    const [totalItems, tasks] = await Promise.all([
      this.tasksRepository.count(filter),
      this.collect(this.tasksRepository.find(filter, { sort, skip, limit: pageSize })),
    ]);

    const today = this.clock.today();

    return {
      tasks: tasks.map(task => toTaskResponse(task, today)),
      pagination: buildPaginationInfo(page, pageSize, totalItems),
    };
  }

  private async collect(source: AsyncIterable<Task>): Promise<Task[]> {
    const tasks: Task[] = [];
    for await (const task of wellFormedTasks(source, this.logger)) {
      tasks.push(task);
    }
    return tasks;
  }
}
