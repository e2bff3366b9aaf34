import { IsEnum, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { TaskPriority } from '../enums/task-priority.enum';
import { IsCalendarDate } from '../../../common/validators/calendar-date.validator';

export class CreateTaskDto {
  @ApiProperty({ example: 'Fix login redirect' })
  @IsString()
  @IsNotEmpty()
  title!: string;

  @ApiProperty({ example: 'Users land on a blank page after signing in', required: false })
  @IsString()
  @IsOptional()
  description?: string;

  @ApiProperty({ example: '2026-12-31', description: 'Calendar date, YYYY-MM-DD' })
  @IsCalendarDate()
  dueDate!: string;

  @ApiProperty({ enum: TaskPriority, example: TaskPriority.MEDIUM, required: false })
  @IsEnum(TaskPriority)
  @IsOptional()
  priority?: TaskPriority;

  @ApiProperty({ example: '3f1c2a9e-5b7d-4e21-9c0a-7d8e6f5a4b3c', required: false })
  @IsString()
  @IsOptional()
  assignedTo?: string;

  @ApiProperty({
    example: 'Europe/London',
    required: false,
    description: "Defaults to the creator's profile timezone",
  })
  @IsString()
  @IsOptional()
  timezone?: string;
}
