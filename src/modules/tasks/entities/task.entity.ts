import { IsDate, IsEnum, IsOptional, IsString, Matches, MinLength } from 'class-validator';
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { TaskStatus } from '../enums/task-status.enum';
import { TaskPriority } from '../enums/task-priority.enum';

/**
 * Stored task record. The class-validator rules describe what a well-formed
 * row looks like; rows written by older clients may break them and are
 * filtered out on read (see mappers/task.mapper.ts).
 */
@Entity('tasks')
@Index('idx_tasks_created_by', ['createdBy'])
@Index('idx_tasks_assigned_to', ['assignedTo'])
@Index('idx_tasks_status', ['status'])
@Index('idx_tasks_priority', ['priority'])
@Index('idx_tasks_due_date', ['dueDate'])
export class Task {
  @PrimaryGeneratedColumn('uuid')
  @Matches(/^[0-9a-fA-F-]{10,}$/)
  id!: string;

  @Column({ length: 200 })
  @IsString()
  @MinLength(1)
  title!: string;

  @Column({ type: 'text', default: '' })
  @IsString()
  description!: string;

  // varchar rather than enum: status sorts lexically, unlike priority.
  @Column({ type: 'varchar', length: 20, default: TaskStatus.TODO })
  @IsEnum(TaskStatus)
  status!: TaskStatus;

  // Postgres enums sort by declaration order, giving LOW < MEDIUM < HIGH.
  @Column({
    type: 'enum',
    enum: TaskPriority,
    default: TaskPriority.MEDIUM,
  })
  @IsEnum(TaskPriority)
  priority!: TaskPriority;

  // Stored as text so that lexical and chronological order coincide.
  @Column({ name: 'due_date', type: 'varchar', length: 10 })
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  dueDate!: string;

  @Column({ name: 'created_by', update: false })
  @IsString()
  @MinLength(1)
  createdBy!: string;

  @Column({ name: 'assigned_to', type: 'varchar', nullable: true })
  @IsOptional()
  @IsString()
  assignedTo!: string | null;

  @Column({ type: 'varchar', length: 64, default: 'UTC' })
  @IsString()
  timezone!: string;

  @CreateDateColumn({ name: 'created_at' })
  @IsDate()
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  @IsDate()
  updatedAt!: Date;
}
