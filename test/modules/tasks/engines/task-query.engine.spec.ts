import { FixedClock } from '../../../../src/common/services/clock.service';
import { TaskQueryEngine } from '../../../../src/modules/tasks/engines/task-query.engine';
import { SortOrder, TaskSortField } from '../../../../src/modules/tasks/enums/task-sort.enum';
import { TaskPriority } from '../../../../src/modules/tasks/enums/task-priority.enum';
import { TaskStatus } from '../../../../src/modules/tasks/enums/task-status.enum';
import { resolveAccessScope } from '../../../../src/modules/tasks/query/access-scope';
import { InMemoryTasksRepository } from '../../../support/in-memory-tasks.repository';
import { ALICE, BOB, TODAY, buildTask, taskId } from '../../../support/task.factory';

describe('TaskQueryEngine', () => {
  let repository: InMemoryTasksRepository;
  let engine: TaskQueryEngine;

  const aliceScope = resolveAccessScope(ALICE, false);

  beforeEach(() => {
    repository = new InMemoryTasksRepository();
    repository.seed(
      buildTask(1, { dueDate: '2025-06-01' }),
      buildTask(2, { status: TaskStatus.DONE, priority: TaskPriority.HIGH }),
      buildTask(3, { priority: TaskPriority.LOW }),
      buildTask(4, { createdBy: BOB }),
      buildTask(5, { createdBy: BOB, assignedTo: ALICE, priority: TaskPriority.HIGH }),
    );
    engine = new TaskQueryEngine(repository, new FixedClock(TODAY));
  });

  it('should list visible tasks newest first by default', async () => {
    const result = await engine.list(aliceScope);

    expect(result.tasks.map(task => task.id)).toEqual([
      taskId(5),
      taskId(3),
      taskId(2),
      taskId(1),
    ]);
    expect(result.pagination).toEqual({
      page: 1,
      pageSize: 10,
      totalItems: 4,
      totalPages: 1,
      hasNext: false,
      hasPrevious: false,
    });
  });

  it('should page through results', async () => {
    const result = await engine.list(aliceScope, { page: 2, pageSize: 3 });

    expect(result.tasks.map(task => task.id)).toEqual([taskId(1)]);
    expect(result.pagination).toEqual({
      page: 2,
      pageSize: 3,
      totalItems: 4,
      totalPages: 2,
      hasNext: false,
      hasPrevious: true,
    });
  });

  it('should apply equality filters', async () => {
    const result = await engine.list(aliceScope, { priority: TaskPriority.HIGH });

    expect(result.tasks.map(task => task.id)).toEqual([taskId(5), taskId(2)]);
    expect(result.pagination.totalItems).toBe(2);
  });

  it('should sort by priority rank and keep ties in creation order', async () => {
    const result = await engine.list(aliceScope, {
      sortBy: TaskSortField.PRIORITY,
      sortOrder: SortOrder.ASC,
    });

    expect(result.tasks.map(task => task.id)).toEqual([
      taskId(3),
      taskId(1),
      taskId(2),
      taskId(5),
    ]);
  });

  it('should show every task to an admin scope', async () => {
    const result = await engine.list(resolveAccessScope(ALICE, true));

    expect(result.pagination.totalItems).toBe(5);
  });

  it('should map tasks to responses with an overdue flag', async () => {
    const result = await engine.list(aliceScope, { status: TaskStatus.TODO, createdBy: ALICE });

    expect(result.tasks).toEqual([
      {
        id: taskId(3),
        title: 'Task number 3',
        description: '',
        status: TaskStatus.TODO,
        priority: TaskPriority.LOW,
        dueDate: '2025-07-01',
        createdBy: ALICE,
        assignedTo: null,
        timezone: 'UTC',
        isOverdue: false,
        createdAt: '2025-01-01T00:03:00.000Z',
        updatedAt: '2025-01-01T00:03:00.000Z',
      },
      expect.objectContaining({ id: taskId(1), dueDate: '2025-06-01', isOverdue: true }),
    ]);
  });

  it('should leave malformed records out of the page', async () => {
    repository.seed(buildTask(6, { title: '' }));

    const result = await engine.list(aliceScope);

    expect(result.tasks.map(task => task.id)).not.toContain(taskId(6));
    expect(result.tasks).toHaveLength(4);
  });
});
