import { IsEnum, IsInt, IsOptional, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { TaskStatus } from '../enums/task-status.enum';
import { TaskPriority } from '../enums/task-priority.enum';
import { SortOrder, TaskSortField } from '../enums/task-sort.enum';
import { TaskFilterOptions } from '../interfaces/task-results.interface';
import { IsCalendarDate } from '../../../common/validators/calendar-date.validator';

function toUpperCase({ value }: { value: unknown }): unknown {
  return typeof value === 'string' && value.length > 0 ? value.toUpperCase() : value;
}

function toLowerCase({ value }: { value: unknown }): unknown {
  return typeof value === 'string' && value.length > 0 ? value.toLowerCase() : value;
}

/**
 * Query parameters for listing tasks. page/pageSize are not range-checked
 * here: out-of-range values are clamped by the query engine.
 */
export class TaskFilterDto implements TaskFilterOptions {
  @ApiProperty({
    enum: TaskStatus,
    required: false,
    description: 'Filter tasks by status (case-insensitive)',
  })
  @IsOptional()
  @Transform(toUpperCase)
  @IsEnum(TaskStatus, {
    message: `status must be one of: ${Object.values(TaskStatus).join(', ')}`,
  })
  status?: TaskStatus;

  @ApiProperty({
    enum: TaskPriority,
    required: false,
    description: 'Filter tasks by priority (case-insensitive)',
  })
  @IsOptional()
  @Transform(toUpperCase)
  @IsEnum(TaskPriority, {
    message: `priority must be one of: ${Object.values(TaskPriority).join(', ')}`,
  })
  priority?: TaskPriority;

  @ApiProperty({ required: false, description: 'Only tasks assigned to this user' })
  @IsOptional()
  @IsString()
  assignedTo?: string;

  @ApiProperty({ required: false, description: 'Only tasks created by this user' })
  @IsOptional()
  @IsString()
  createdBy?: string;

  @ApiProperty({ required: false, example: '2026-01-01', description: 'Due on or after' })
  @IsOptional()
  @IsCalendarDate()
  startDate?: string;

  @ApiProperty({ required: false, example: '2026-12-31', description: 'Due on or before' })
  @IsOptional()
  @IsCalendarDate()
  endDate?: string;

  @ApiProperty({ required: false, type: Number, default: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'page must be an integer' })
  page?: number;

  @ApiProperty({ required: false, type: Number, default: 10, maximum: 100 })
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'pageSize must be an integer' })
  pageSize?: number;

  @ApiProperty({ enum: TaskSortField, required: false, default: TaskSortField.CREATED_AT })
  @IsOptional()
  @IsEnum(TaskSortField)
  sortBy?: TaskSortField;

  @ApiProperty({ enum: SortOrder, required: false, default: SortOrder.DESC })
  @IsOptional()
  @Transform(toLowerCase)
  @IsEnum(SortOrder)
  sortOrder?: SortOrder;
}
