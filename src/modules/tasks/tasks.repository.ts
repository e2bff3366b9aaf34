import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { isUUID } from 'class-validator';
import { Repository, SelectQueryBuilder } from 'typeorm';
import tasksConfig from '../../config/tasks.config';
import { Task } from './entities/task.entity';
import { SortOrder, TaskSortField } from './enums/task-sort.enum';
import { TaskFilter, TaskFilters, compileTaskFilter } from './query/task-filter';
import {
  ITasksRepository,
  NewTask,
  TaskChanges,
  TaskFindOptions,
} from './tasks.repository.interface';

// Byte-order collation, matching the in-memory comparator used by search.
const COLLATED_SORT_FIELDS: ReadonlySet<TaskSortField> = new Set([
  TaskSortField.TITLE,
  TaskSortField.STATUS,
  TaskSortField.DUE_DATE,
]);

/**
 * The id column is a Postgres uuid: an id that is not a UUID cannot be
 * stored, so it matches nothing rather than failing the cast.
 */
export function withStorableIds(filter: TaskFilter): TaskFilter {
  switch (filter.kind) {
    case 'eq':
      return filter.field === 'id' && !isUUID(filter.value) ? TaskFilters.or() : filter;
    case 'and':
      return { kind: 'and', filters: filter.filters.map(withStorableIds) };
    case 'or':
      return { kind: 'or', filters: filter.filters.map(withStorableIds) };
    default:
      return filter;
  }
}

function sortExpression(field: TaskSortField): string {
  return COLLATED_SORT_FIELDS.has(field) ? `task.${field} COLLATE "C"` : `task.${field}`;
}

@Injectable()
export class TasksRepository implements ITasksRepository {
  constructor(
    @InjectRepository(Task)
    private readonly tasksRepo: Repository<Task>,
    @Inject(tasksConfig.KEY)
    private readonly config: ConfigType<typeof tasksConfig>,
  ) {}

  async *find(filter: TaskFilter, options: TaskFindOptions = {}): AsyncIterable<Task> {
    const chunkSize = this.config.streamChunkSize;
    let offset = options.skip ?? 0;
    let remaining = options.limit ?? Number.POSITIVE_INFINITY;

    while (remaining > 0) {
      const take = Math.min(chunkSize, remaining);
      const chunk = await this.buildQuery(filter, options).skip(offset).take(take).getMany();

      for (const task of chunk) {
        yield task;
      }

      if (chunk.length < take) {
        return;
      }

      offset += chunk.length;
      remaining -= chunk.length;
    }
  }

  async count(filter: TaskFilter): Promise<number> {
    return this.filtered(filter).getCount();
  }

  async findOne(filter: TaskFilter): Promise<Task | null> {
    return this.filtered(filter).getOne();
  }

  async insert(task: NewTask): Promise<Task> {
    const entity = this.tasksRepo.create(task);
    return this.tasksRepo.save(entity);
  }

  async updateOne(filter: TaskFilter, changes: TaskChanges): Promise<number> {
    const target = await this.filtered(filter).select('task.id').getOne();
    if (!target) {
      return 0;
    }

    const result = await this.tasksRepo
      .createQueryBuilder()
      .update(Task)
      .set(changes)
      .where('id = :id', { id: target.id })
      .execute();

    return result.affected ?? 0;
  }

  async deleteOne(filter: TaskFilter): Promise<number> {
    const target = await this.filtered(filter).select('task.id').getOne();
    if (!target) {
      return 0;
    }

    const result = await this.tasksRepo
      .createQueryBuilder()
      .delete()
      .from(Task)
      .where('id = :id', { id: target.id })
      .execute();

    return result.affected ?? 0;
  }

  private filtered(filter: TaskFilter): SelectQueryBuilder<Task> {
    const { where, parameters } = compileTaskFilter(withStorableIds(filter), 'task');
    return this.tasksRepo.createQueryBuilder('task').where(where, parameters);
  }

  private buildQuery(filter: TaskFilter, options: TaskFindOptions): SelectQueryBuilder<Task> {
    const query = this.filtered(filter);

    if (options.sort) {
      query.orderBy(
        sortExpression(options.sort.field),
        options.sort.order === SortOrder.ASC ? 'ASC' : 'DESC',
      );
      // Tie-break on insertion order so paging is deterministic.
      query.addOrderBy('task.createdAt', 'ASC').addOrderBy('task.id', 'ASC');
    } else {
      query.orderBy('task.createdAt', 'ASC').addOrderBy('task.id', 'ASC');
    }

    return query;
  }
}
