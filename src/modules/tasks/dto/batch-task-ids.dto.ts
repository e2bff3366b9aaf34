import { IsArray, IsString } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

/**
 * Size, duplicate and id-shape rules are enforced by the batch coordinator
 * so that they report their own error codes.
 */
export class BatchTaskIdsDto {
  @ApiProperty({
    type: [String],
    description: 'Task IDs to process (1-50, no duplicates)',
    example: ['123e4567-e89b-12d3-a456-426614174000', '123e4567-e89b-12d3-a456-426614174001'],
  })
  @IsArray({ message: 'taskIds must be an array' })
  @IsString({ each: true })
  taskIds!: string[];
}
