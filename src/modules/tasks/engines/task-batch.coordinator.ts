import { Injectable, Logger } from '@nestjs/common';
import { ErrorCode, badRequest, conflict } from '../../../common/errors';
import { settle } from '../../../common/utils/result.util';
import { TASK_LIMITS } from '../constants/task-limits';
import { BatchOperationResult } from '../interfaces/task-results.interface';
import { ensureValid, validateTaskId } from '../validation/task.validators';

export type TaskOperation = (id: string) => Promise<unknown>;

/**
 * Applies a single-task operation to every id of a batch. Whole-batch
 * preconditions are checked before anything runs; after that each id
 * succeeds or fails on its own and nothing is rolled back.
 */
@Injectable()
export class TaskBatchCoordinator {
  private readonly logger = new Logger(TaskBatchCoordinator.name);

  async run(ids: string[], operation: TaskOperation, label: string): Promise<BatchOperationResult> {
    this.assertRunnable(ids);

    // Items run concurrently; the outcomes array keeps input order.
    const outcomes = await Promise.all(ids.map(id => settle(() => operation(id))));

    const result: BatchOperationResult = {
      successful: 0,
      failed: 0,
      successfulIds: [],
      failedIds: [],
      errors: {},
    };

    outcomes.forEach((outcome, index) => {
      const id = ids[index];
      if (outcome.ok) {
        result.successful++;
        result.successfulIds.push(id);
      } else {
        result.failed++;
        result.failedIds.push(id);
        result.errors[id] = outcome.error.message;
        this.logger.warn(`Batch ${label}: task ${id} failed: ${outcome.error.message}`);
      }
    });

    this.logger.log(
      `Batch ${label} finished: ${result.successful} succeeded, ${result.failed} failed`,
    );

    return result;
  }

  assertRunnable(ids: string[]): void {
    if (ids.length === 0) {
      badRequest(ErrorCode.BATCH_EMPTY);
    }

    if (ids.length > TASK_LIMITS.MAX_BATCH_SIZE) {
      badRequest(ErrorCode.BATCH_TOO_LARGE, { max: TASK_LIMITS.MAX_BATCH_SIZE });
    }

    const seen = new Set<string>();
    for (const id of ids) {
      if (seen.has(id)) {
        conflict(ErrorCode.BATCH_DUPLICATE_ID, { id });
      }
      seen.add(id);
    }

    ids.forEach(id => ensureValid(validateTaskId(id)));
  }
}
