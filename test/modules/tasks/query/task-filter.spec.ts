import { compileTaskFilter, TaskFilters } from '../../../../src/modules/tasks/query/task-filter';
import { canViewTask, resolveAccessScope } from '../../../../src/modules/tasks/query/access-scope';
import { composeTaskFilter } from '../../../../src/modules/tasks/query/compose-filter';
import { TaskStatus } from '../../../../src/modules/tasks/enums/task-status.enum';
import { ErrorCode } from '../../../../src/common/errors';
import { thrownBy } from '../../../support/http-error';
import { ALICE, BOB } from '../../../support/task.factory';

describe('task filters', () => {
  describe('TaskFilters', () => {
    it('should drop match-all members from a conjunction', () => {
      const status = TaskFilters.eq('status', TaskStatus.DONE);

      expect(TaskFilters.and(TaskFilters.all(), status)).toBe(status);
      expect(TaskFilters.and(TaskFilters.all())).toEqual({ kind: 'all' });
    });

    it('should collapse a disjunction containing match-all', () => {
      expect(TaskFilters.or(TaskFilters.byId('x'), TaskFilters.all())).toEqual({ kind: 'all' });
    });

    it('should treat an unbounded date range as match-all', () => {
      expect(TaskFilters.dueDateBetween()).toEqual({ kind: 'all' });
    });
  });

  describe('compileTaskFilter', () => {
    it('should bind every value as a parameter', () => {
      expect(compileTaskFilter(TaskFilters.byId('abc'))).toEqual({
        where: 'task.id = :f0',
        parameters: { f0: 'abc' },
      });
    });

    it('should compile match-all and an empty disjunction', () => {
      expect(compileTaskFilter(TaskFilters.all()).where).toBe('1 = 1');
      expect(compileTaskFilter(TaskFilters.or()).where).toBe('1 = 0');
    });

    it('should use the given alias', () => {
      expect(compileTaskFilter(TaskFilters.dueDateBetween(undefined, '2025-12-31'), 't')).toEqual({
        where: 't.dueDate <= :f0',
        parameters: { f0: '2025-12-31' },
      });
    });

    it('should nest a scoped listing filter', () => {
      const filter = composeTaskFilter(resolveAccessScope(ALICE, false), {
        status: TaskStatus.TODO,
        startDate: '2025-01-01',
        endDate: '2025-12-31',
      });

      expect(compileTaskFilter(filter)).toEqual({
        where:
          '((task.createdBy = :f0) OR (task.assignedTo = :f1)) AND (task.status = :f2) AND ' +
          '(task.dueDate >= :f3 AND task.dueDate <= :f4)',
        parameters: {
          f0: ALICE,
          f1: ALICE,
          f2: 'TODO',
          f3: '2025-01-01',
          f4: '2025-12-31',
        },
      });
    });
  });

  describe('access scope', () => {
    it('should give admins an unrestricted scope', () => {
      expect(resolveAccessScope(ALICE, true)).toEqual({ kind: 'all' });
    });

    it('should limit users to tasks they created or are assigned', () => {
      expect(resolveAccessScope(ALICE, false)).toEqual({
        kind: 'or',
        filters: [
          { kind: 'eq', field: 'createdBy', value: ALICE },
          { kind: 'eq', field: 'assignedTo', value: ALICE },
        ],
      });
    });

    it('should apply the same rule to a loaded task', () => {
      const task = { createdBy: ALICE, assignedTo: BOB };

      expect(canViewTask(task, ALICE, false)).toBe(true);
      expect(canViewTask(task, BOB, false)).toBe(true);
      expect(canViewTask(task, 'user-carol', false)).toBe(false);
      expect(canViewTask(task, 'user-carol', true)).toBe(true);
    });
  });

  describe('composeTaskFilter', () => {
    it('should reject an inverted due-date range', () => {
      const error = thrownBy(() =>
        composeTaskFilter(TaskFilters.all(), { startDate: '2025-03-01', endDate: '2025-02-01' }),
      );

      expect(error.getStatus()).toBe(400);
      expect(error.getResponse()).toEqual({
        code: ErrorCode.VALIDATION_DATE_RANGE,
        message: 'startDate must not be after endDate',
      });
    });

    it('should return the scope alone when no filters are given', () => {
      const scope = resolveAccessScope(ALICE, false);

      expect(composeTaskFilter(scope, {})).toBe(scope);
    });
  });
});
