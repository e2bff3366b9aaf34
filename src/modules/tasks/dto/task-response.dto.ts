import { ApiProperty } from '@nestjs/swagger';
import { TaskStatus } from '../enums/task-status.enum';
import { TaskPriority } from '../enums/task-priority.enum';
import {
  BatchOperationResult,
  PaginatedTaskResponse,
  PaginationInfo,
  TaskResponse,
  TaskStatistics,
} from '../interfaces/task-results.interface';

export class TaskResponseDto implements TaskResponse {
  @ApiProperty({ example: '123e4567-e89b-12d3-a456-426614174000' })
  id!: string;

  @ApiProperty({ example: 'Fix login redirect' })
  title!: string;

  @ApiProperty({ example: 'Users land on a blank page after signing in' })
  description!: string;

  @ApiProperty({ enum: TaskStatus, example: TaskStatus.TODO })
  status!: TaskStatus;

  @ApiProperty({ enum: TaskPriority, example: TaskPriority.HIGH })
  priority!: TaskPriority;

  @ApiProperty({ example: '2026-12-31' })
  dueDate!: string;

  @ApiProperty({ description: 'ID of the user who created the task' })
  createdBy!: string;

  @ApiProperty({ nullable: true, description: 'ID of the assigned user' })
  assignedTo!: string | null;

  @ApiProperty({ example: 'UTC' })
  timezone!: string;

  @ApiProperty({ description: 'Not done and due before today' })
  isOverdue!: boolean;

  @ApiProperty({ example: '2026-10-01T10:30:00.000Z' })
  createdAt!: string;

  @ApiProperty({ example: '2026-10-05T14:20:00.000Z' })
  updatedAt!: string;
}

export class PaginationInfoDto implements PaginationInfo {
  @ApiProperty({ example: 1 })
  page!: number;

  @ApiProperty({ example: 10 })
  pageSize!: number;

  @ApiProperty({ example: 42 })
  totalItems!: number;

  @ApiProperty({ example: 5, description: '1 when there are no items' })
  totalPages!: number;

  @ApiProperty({ example: true })
  hasNext!: boolean;

  @ApiProperty({ example: false })
  hasPrevious!: boolean;
}

export class PaginatedTaskResponseDto implements PaginatedTaskResponse {
  @ApiProperty({ type: [TaskResponseDto] })
  tasks!: TaskResponseDto[];

  @ApiProperty({ type: PaginationInfoDto })
  pagination!: PaginationInfoDto;
}

export class BatchOperationResultDto implements BatchOperationResult {
  @ApiProperty({ example: 2 })
  successful!: number;

  @ApiProperty({ example: 1 })
  failed!: number;

  @ApiProperty({ type: [String] })
  successfulIds!: string[];

  @ApiProperty({ type: [String] })
  failedIds!: string[];

  @ApiProperty({
    type: 'object',
    additionalProperties: { type: 'string' },
    example: { '123e4567-e89b-12d3-a456-426614174009': 'Task 123e4567-e89b-12d3-a456-426614174009 not found' },
  })
  errors!: Record<string, string>;
}

export class TaskStatisticsDto implements TaskStatistics {
  @ApiProperty({ example: 25 })
  total!: number;

  @ApiProperty({ example: { TODO: 10, IN_PROGRESS: 8, DONE: 7 } })
  byStatus!: Record<TaskStatus, number>;

  @ApiProperty({ example: { LOW: 5, MEDIUM: 15, HIGH: 5 } })
  byPriority!: Record<TaskPriority, number>;

  @ApiProperty({ example: 3 })
  overdue!: number;
}
