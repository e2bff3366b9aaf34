import { BadRequestException, ConflictException } from '@nestjs/common';
import { ErrorCode, notFound } from '../../../../src/common/errors';
import { TaskBatchCoordinator } from '../../../../src/modules/tasks/engines/task-batch.coordinator';
import { rejectionOf } from '../../../support/http-error';
import { taskId } from '../../../support/task.factory';

describe('TaskBatchCoordinator', () => {
  let coordinator: TaskBatchCoordinator;
  let operation: jest.Mock<Promise<unknown>, [string]>;

  beforeEach(() => {
    coordinator = new TaskBatchCoordinator();
    operation = jest.fn<Promise<unknown>, [string]>(async id => id);
  });

  it('should reject an empty batch', async () => {
    const error = await rejectionOf(coordinator.run([], operation, 'delete'));

    expect(error).toBeInstanceOf(BadRequestException);
    expect(error.getResponse()).toEqual({
      code: ErrorCode.BATCH_EMPTY,
      message: 'At least one task ID is required',
    });
  });

  it('should reject more than 50 ids before running any', async () => {
    const ids = Array.from({ length: 51 }, (_, index) => taskId(index + 1));

    const error = await rejectionOf(coordinator.run(ids, operation, 'delete'));

    expect(error.getStatus()).toBe(400);
    expect(error.getResponse()).toEqual({
      code: ErrorCode.BATCH_TOO_LARGE,
      message: 'Cannot process more than 50 tasks at once',
    });
    expect(operation).not.toHaveBeenCalled();
  });

  it('should accept exactly 50 ids', async () => {
    const ids = Array.from({ length: 50 }, (_, index) => taskId(index + 1));

    const result = await coordinator.run(ids, operation, 'delete');

    expect(result.successful).toBe(50);
    expect(operation).toHaveBeenCalledTimes(50);
  });

  it('should reject duplicate ids with a conflict and run nothing', async () => {
    const error = await rejectionOf(
      coordinator.run([taskId(1), taskId(2), taskId(1)], operation, 'delete'),
    );

    expect(error).toBeInstanceOf(ConflictException);
    expect(error.getResponse()).toEqual({
      code: ErrorCode.BATCH_DUPLICATE_ID,
      message: `Duplicate task ID in batch: ${taskId(1)}`,
    });
    expect(operation).not.toHaveBeenCalled();
  });

  it('should reject a malformed id before running any', async () => {
    const error = await rejectionOf(coordinator.run([taskId(1), 'bad'], operation, 'delete'));

    expect(error.getResponse()).toEqual({
      code: ErrorCode.VALIDATION_TASK_ID,
      message: 'Invalid task ID: bad',
    });
    expect(operation).not.toHaveBeenCalled();
  });

  it('should isolate per-item failures and keep input order', async () => {
    const missing = taskId(2);
    operation.mockImplementation(async (id: string) => {
      if (id === missing) {
        notFound(ErrorCode.TASK_NOT_FOUND, { id });
      }
      return id;
    });

    const result = await coordinator.run([taskId(3), missing, taskId(1)], operation, 'delete');

    expect(result).toEqual({
      successful: 2,
      failed: 1,
      successfulIds: [taskId(3), taskId(1)],
      failedIds: [missing],
      errors: { [missing]: `Task ${missing} not found` },
    });
  });

  it('should record plain errors by message', async () => {
    operation.mockRejectedValue(new Error('connection reset'));

    const result = await coordinator.run([taskId(1)], operation, 'status-update');

    expect(result.failed).toBe(1);
    expect(result.errors).toEqual({ [taskId(1)]: 'connection reset' });
  });
});
