import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import tasksConfig from '../../config/tasks.config';
import { ErrorCode, forbid, notFound, badRequest } from '../../common/errors';
import { CLOCK, Clock } from '../../common/services/clock.service';
import type { AuthUser } from '../../common/types';
import type { IUsersRepository } from '../users/users.repository.interface';
import { USERS_REPOSITORY } from '../users/users.repository.interface';
import { isAdmin } from '../users/utils/users.utils';
import { CreateTaskDto } from './dto/create-task.dto';
import { UpdateTaskDto } from './dto/update-task.dto';
import { TaskBatchCoordinator } from './engines/task-batch.coordinator';
import { TaskQueryEngine } from './engines/task-query.engine';
import { TaskSearchEngine } from './engines/task-search.engine';
import { TaskStatisticsAggregator } from './engines/task-statistics.aggregator';
import { Task } from './entities/task.entity';
import { TaskPriority } from './enums/task-priority.enum';
import { TaskStatus } from './enums/task-status.enum';
import {
  BatchOperationResult,
  PaginatedTaskResponse,
  TaskFilterOptions,
  TaskResponse,
  TaskStatistics,
} from './interfaces/task-results.interface';
import { toTaskResponse } from './mappers/task.mapper';
import { canViewTask, resolveAccessScope } from './query/access-scope';
import { TaskFilter, TaskFilters } from './query/task-filter';
import type { ITasksRepository, TaskChanges } from './tasks.repository.interface';
import { TASKS_REPOSITORY } from './tasks.repository.interface';
import {
  ensureValid,
  validateDescription,
  validateDueDate,
  validateSearchQuery,
  validateTaskId,
  validateTaskPriority,
  validateTaskStatus,
  validateTimezone,
  validateTitle,
} from './validation/task.validators';

/**
 * Entry point for every task operation. Holds no per-request state; all
 * collaborators are injected and immutable.
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    @Inject(TASKS_REPOSITORY)
    private readonly tasksRepository: ITasksRepository,
    @Inject(USERS_REPOSITORY)
    private readonly usersRepository: IUsersRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
    @Inject(tasksConfig.KEY)
    private readonly config: ConfigType<typeof tasksConfig>,
    private readonly queryEngine: TaskQueryEngine,
    private readonly searchEngine: TaskSearchEngine,
    private readonly batchCoordinator: TaskBatchCoordinator,
    private readonly statisticsAggregator: TaskStatisticsAggregator,
  ) {}

  async createTask(currentUser: AuthUser, createTaskDto: CreateTaskDto): Promise<TaskResponse> {
    const today = this.clock.today();
    const description = createTaskDto.description ?? '';
    const priority = createTaskDto.priority ?? TaskPriority.MEDIUM;

    ensureValid(validateTitle(createTaskDto.title));
    ensureValid(validateDescription(description));
    ensureValid(validateDueDate(createTaskDto.dueDate, today));
    ensureValid(validateTaskPriority(priority));
    if (createTaskDto.timezone !== undefined) {
      ensureValid(validateTimezone(createTaskDto.timezone));
    }

    if (createTaskDto.assignedTo !== undefined) {
      await this.assertAssigneeExists(createTaskDto.assignedTo);
    }

    const timezone = createTaskDto.timezone ?? (await this.profileTimezone(currentUser.id));
    const now = this.clock.now();

    const task = await this.tasksRepository.insert({
      title: createTaskDto.title.trim(),
      description,
      status: TaskStatus.TODO,
      priority,
      dueDate: createTaskDto.dueDate,
      createdBy: currentUser.id,
      assignedTo: createTaskDto.assignedTo ?? null,
      timezone,
      createdAt: now,
      updatedAt: now,
    });

    this.logger.log(`Task ${task.id} created by user ${currentUser.id}`);

    return toTaskResponse(task, today);
  }

  async updateTask(
    currentUser: AuthUser,
    id: string,
    updateTaskDto: UpdateTaskDto,
  ): Promise<TaskResponse> {
    ensureValid(validateTaskId(id));
    const changes = this.collectChanges(updateTaskDto);

    const task = await this.requireTask(id);
    if (task.createdBy !== currentUser.id && task.assignedTo !== currentUser.id) {
      forbid(ErrorCode.TASK_UPDATE_FORBIDDEN);
    }

    if (typeof changes.assignedTo === 'string') {
      await this.assertAssigneeExists(changes.assignedTo);
    }

    const updated = await this.tasksRepository.updateOne(TaskFilters.byId(id), {
      ...changes,
      updatedAt: this.clock.now(),
    });

    // Deleted between the lookup and the write.
    if (updated === 0) {
      notFound(ErrorCode.TASK_NOT_FOUND, { id });
    }

    this.logger.log(
      `Task ${id} updated by user ${currentUser.id} (${Object.keys(changes).join(', ')})`,
    );

    return toTaskResponse(await this.requireTask(id), this.clock.today());
  }

  async deleteTask(currentUser: AuthUser, id: string): Promise<boolean> {
    ensureValid(validateTaskId(id));

    const task = await this.requireTask(id);
    if (task.createdBy !== currentUser.id) {
      forbid(ErrorCode.TASK_DELETE_FORBIDDEN);
    }

    const deleted = await this.tasksRepository.deleteOne(TaskFilters.byId(id));
    if (deleted === 0) {
      notFound(ErrorCode.TASK_NOT_FOUND, { id });
    }

    this.logger.log(`Task ${id} deleted by user ${currentUser.id}`);

    return true;
  }

  /**
   * Loads one task. Visibility is enforced when a caller is given; the
   * HTTP layer always passes one.
   */
  async getTask(id: string, currentUser?: AuthUser): Promise<TaskResponse> {
    ensureValid(validateTaskId(id));

    const task = await this.requireTask(id);
    if (currentUser && !canViewTask(task, currentUser.id, isAdmin(currentUser.role))) {
      forbid(ErrorCode.TASK_ACCESS_DENIED);
    }

    return toTaskResponse(task, this.clock.today());
  }

  async listTasks(
    currentUser: AuthUser,
    options: TaskFilterOptions = {},
  ): Promise<PaginatedTaskResponse> {
    return this.queryEngine.list(this.scopeFor(currentUser), options);
  }

  async searchTasks(
    currentUser: AuthUser,
    query: string,
    options: TaskFilterOptions = {},
  ): Promise<PaginatedTaskResponse> {
    ensureValid(validateSearchQuery(query));
    return this.searchEngine.search(this.scopeFor(currentUser), query, options);
  }

  async batchDelete(currentUser: AuthUser, ids: string[]): Promise<BatchOperationResult> {
    return this.batchCoordinator.run(ids, id => this.deleteTask(currentUser, id), 'delete');
  }

  async batchUpdateStatus(
    currentUser: AuthUser,
    ids: string[],
    status: TaskStatus,
  ): Promise<BatchOperationResult> {
    ensureValid(validateTaskStatus(status));
    return this.batchCoordinator.run(
      ids,
      id => this.updateTask(currentUser, id, { status }),
      'status-update',
    );
  }

  async getStatistics(currentUser: AuthUser): Promise<TaskStatistics> {
    return this.statisticsAggregator.aggregate(this.scopeFor(currentUser));
  }

  private scopeFor(currentUser: AuthUser): TaskFilter {
    return resolveAccessScope(currentUser.id, isAdmin(currentUser.role));
  }

  private async requireTask(id: string): Promise<Task> {
    const task = await this.tasksRepository.findOne(TaskFilters.byId(id));
    if (!task) {
      notFound(ErrorCode.TASK_NOT_FOUND, { id });
    }
    return task;
  }

  private async assertAssigneeExists(userId: string): Promise<void> {
    const user = await this.usersRepository.findById(userId);
    if (!user) {
      notFound(ErrorCode.TASK_ASSIGNEE_NOT_FOUND, { id: userId });
    }
  }

  private async profileTimezone(userId: string): Promise<string> {
    const user = await this.usersRepository.findById(userId);
    return user?.timezone ?? this.config.defaultTimezone;
  }

  /**
   * Validates the fields present in an update and turns them into store
   * changes. Fails before any write if a field is invalid or none is given.
   */
  private collectChanges(updateTaskDto: UpdateTaskDto): TaskChanges {
    const changes: TaskChanges = {};
    const { title, description, status, priority, dueDate, assignedTo, timezone } =
      updateTaskDto;

    if (title !== undefined) {
      ensureValid(validateTitle(title));
      changes.title = title.trim();
    }
    if (description !== undefined) {
      ensureValid(validateDescription(description));
      changes.description = description;
    }
    if (status !== undefined) {
      ensureValid(validateTaskStatus(status));
      changes.status = status;
    }
    if (priority !== undefined) {
      ensureValid(validateTaskPriority(priority));
      changes.priority = priority;
    }
    if (dueDate !== undefined) {
      ensureValid(validateDueDate(dueDate, this.clock.today()));
      changes.dueDate = dueDate;
    }
    if (assignedTo !== undefined) {
      changes.assignedTo = assignedTo;
    }
    if (timezone !== undefined) {
      ensureValid(validateTimezone(timezone));
      changes.timezone = timezone;
    }

    if (Object.keys(changes).length === 0) {
      badRequest(ErrorCode.TASK_NOTHING_TO_UPDATE);
    }

    return changes;
  }
}
