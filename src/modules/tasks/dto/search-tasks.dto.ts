import { IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { TaskFilterDto } from './task-filter.dto';

export class SearchTasksDto extends TaskFilterDto {
  @ApiProperty({ example: 'login', description: 'Substring matched against title and description' })
  @IsString()
  q!: string;
}
