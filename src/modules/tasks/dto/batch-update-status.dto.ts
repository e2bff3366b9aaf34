import { IsEnum } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { TaskStatus } from '../enums/task-status.enum';
import { BatchTaskIdsDto } from './batch-task-ids.dto';

export class BatchUpdateStatusDto extends BatchTaskIdsDto {
  @ApiProperty({ enum: TaskStatus, example: TaskStatus.DONE })
  @IsEnum(TaskStatus)
  status!: TaskStatus;
}
