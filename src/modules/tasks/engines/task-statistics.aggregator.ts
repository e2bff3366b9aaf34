import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../../../common/services/clock.service';
import { TaskPriority } from '../enums/task-priority.enum';
import { TaskStatus } from '../enums/task-status.enum';
import { TaskStatistics } from '../interfaces/task-results.interface';
import { wellFormedTasks } from '../mappers/task.mapper';
import { TaskFilter } from '../query/task-filter';
import type { ITasksRepository } from '../tasks.repository.interface';
import { TASKS_REPOSITORY } from '../tasks.repository.interface';
import { isOverdue } from '../utils/task-overdue.util';

export function emptyStatistics(): TaskStatistics {
  return {
    total: 0,
    byStatus: {
      [TaskStatus.TODO]: 0,
      [TaskStatus.IN_PROGRESS]: 0,
      [TaskStatus.DONE]: 0,
    },
    byPriority: {
      [TaskPriority.LOW]: 0,
      [TaskPriority.MEDIUM]: 0,
      [TaskPriority.HIGH]: 0,
    },
    overdue: 0,
  };
}

@Injectable()
export class TaskStatisticsAggregator {
  private readonly logger = new Logger(TaskStatisticsAggregator.name);

  constructor(
    @Inject(TASKS_REPOSITORY)
    private readonly tasksRepository: ITasksRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /** One streamed pass over the scoped tasks. */
  async aggregate(scope: TaskFilter): Promise<TaskStatistics> {
    const today = this.clock.today();
    const statistics = emptyStatistics();

    for await (const task of wellFormedTasks(this.tasksRepository.find(scope), this.logger)) {
      statistics.total++;
      statistics.byStatus[task.status]++;
      statistics.byPriority[task.priority]++;
      if (isOverdue(task.status, task.dueDate, today)) {
        statistics.overdue++;
      }
    }

    return statistics;
  }
}
