import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { Task } from '../entities/task.entity';
import { TaskResponse } from '../interfaces/task-results.interface';
import { isOverdue } from '../utils/task-overdue.util';

/**
 * Single deserialization step for stored tasks. Rows that fail the entity
 * rules (legacy or hand-edited records) are reported and left out of reads
 * instead of failing the whole query.
 */
export function readStoredTask(stored: Task, logger: Logger): Task | null {
  const task = stored instanceof Task ? stored : plainToInstance(Task, stored);
  const errors = validateSync(task, { skipMissingProperties: false });

  if (errors.length > 0) {
    const fields = errors.map(error => error.property).join(', ');
    logger.warn(`Skipping malformed task record ${String(stored.id)} (invalid: ${fields})`);
    return null;
  }

  return task;
}

export async function* wellFormedTasks(
  source: AsyncIterable<Task>,
  logger: Logger,
): AsyncIterable<Task> {
  for await (const stored of source) {
    const task = readStoredTask(stored, logger);
    if (task) {
      yield task;
    }
  }
}

export function toTaskResponse(task: Task, today: string): TaskResponse {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    priority: task.priority,
    dueDate: task.dueDate,
    createdBy: task.createdBy,
    assignedTo: task.assignedTo ?? null,
    timezone: task.timezone,
    isOverdue: isOverdue(task.status, task.dueDate, today),
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
  };
}
