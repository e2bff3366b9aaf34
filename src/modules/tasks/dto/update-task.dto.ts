import { IsEnum, IsOptional, IsString, ValidateIf } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { TaskPriority } from '../enums/task-priority.enum';
import { TaskStatus } from '../enums/task-status.enum';
import { IsCalendarDate } from '../../../common/validators/calendar-date.validator';

/**
 * Partial update; every field is optional but at least one must be sent.
 * The creator of a task cannot be changed.
 */
export class UpdateTaskDto {
  @ApiProperty({ required: false })
  @IsString()
  @IsOptional()
  title?: string;

  @ApiProperty({ required: false })
  @IsString()
  @IsOptional()
  description?: string;

  @ApiProperty({ enum: TaskStatus, required: false })
  @IsEnum(TaskStatus)
  @IsOptional()
  status?: TaskStatus;

  @ApiProperty({ enum: TaskPriority, required: false })
  @IsEnum(TaskPriority)
  @IsOptional()
  priority?: TaskPriority;

  @ApiProperty({ required: false, example: '2026-12-31' })
  @IsCalendarDate()
  @IsOptional()
  dueDate?: string;

  @ApiProperty({
    required: false,
    nullable: true,
    description: 'User id to assign, or null to unassign',
  })
  @ValidateIf((_, value) => value !== null && value !== undefined)
  @IsString()
  assignedTo?: string | null;

  @ApiProperty({ required: false, example: 'UTC' })
  @IsString()
  @IsOptional()
  timezone?: string;
}
