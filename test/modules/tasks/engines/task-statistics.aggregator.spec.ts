import { FixedClock } from '../../../../src/common/services/clock.service';
import {
  TaskStatisticsAggregator,
  emptyStatistics,
} from '../../../../src/modules/tasks/engines/task-statistics.aggregator';
import { TaskPriority } from '../../../../src/modules/tasks/enums/task-priority.enum';
import { TaskStatus } from '../../../../src/modules/tasks/enums/task-status.enum';
import { resolveAccessScope } from '../../../../src/modules/tasks/query/access-scope';
import { InMemoryTasksRepository } from '../../../support/in-memory-tasks.repository';
import { ALICE, BOB, TODAY, buildTask } from '../../../support/task.factory';

describe('TaskStatisticsAggregator', () => {
  let repository: InMemoryTasksRepository;
  let aggregator: TaskStatisticsAggregator;

  beforeEach(() => {
    repository = new InMemoryTasksRepository();
    repository.seed(
      buildTask(1, { priority: TaskPriority.HIGH, dueDate: '2025-06-01' }),
      buildTask(2, { status: TaskStatus.DONE, priority: TaskPriority.LOW, dueDate: '2025-01-01' }),
      buildTask(3, { status: TaskStatus.IN_PROGRESS }),
      buildTask(4, { title: '' }),
      buildTask(5, { createdBy: BOB }),
    );
    aggregator = new TaskStatisticsAggregator(repository, new FixedClock(TODAY));
  });

  it('should start from zero in every bucket', () => {
    expect(emptyStatistics()).toEqual({
      total: 0,
      byStatus: { TODO: 0, IN_PROGRESS: 0, DONE: 0 },
      byPriority: { LOW: 0, MEDIUM: 0, HIGH: 0 },
      overdue: 0,
    });
  });

  it('should count the tasks a user can see', async () => {
    expect(await aggregator.aggregate(resolveAccessScope(ALICE, false))).toEqual({
      total: 3,
      byStatus: { TODO: 1, IN_PROGRESS: 1, DONE: 1 },
      byPriority: { LOW: 1, MEDIUM: 1, HIGH: 1 },
      overdue: 1,
    });
  });

  it('should count every well-formed task for an admin', async () => {
    expect(await aggregator.aggregate(resolveAccessScope(ALICE, true))).toEqual({
      total: 4,
      byStatus: { TODO: 2, IN_PROGRESS: 1, DONE: 1 },
      byPriority: { LOW: 1, MEDIUM: 2, HIGH: 1 },
      overdue: 1,
    });
  });

  it('should never count a done task as overdue', async () => {
    repository = new InMemoryTasksRepository();
    repository.seed(buildTask(1, { status: TaskStatus.DONE, dueDate: '2024-12-31' }));
    aggregator = new TaskStatisticsAggregator(repository, new FixedClock(TODAY));

    const statistics = await aggregator.aggregate(resolveAccessScope(ALICE, false));

    expect(statistics.total).toBe(1);
    expect(statistics.overdue).toBe(0);
  });

  it('should return empty statistics for a user with no tasks', async () => {
    expect(await aggregator.aggregate(resolveAccessScope('user-nobody', false))).toEqual(
      emptyStatistics(),
    );
  });
});
