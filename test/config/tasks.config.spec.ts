import tasksConfig from '../../src/config/tasks.config';

describe('tasks config', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    delete process.env.TASKS_FIXED_DATE;
    delete process.env.TASKS_STREAM_CHUNK_SIZE;
  });

  afterAll(() => {
    process.env = saved;
  });

  it('should fall back to defaults when nothing is set', () => {
    expect(tasksConfig()).toEqual({
      fixedDate: undefined,
      streamChunkSize: 500,
      defaultTimezone: 'UTC',
    });
  });

  it('should read a pinned date and a chunk size', () => {
    process.env.TASKS_FIXED_DATE = '2024-02-29';
    process.env.TASKS_STREAM_CHUNK_SIZE = '50';

    expect(tasksConfig()).toMatchObject({ fixedDate: '2024-02-29', streamChunkSize: 50 });
  });

  it.each(['0', '-5', 'abc', '2.5'])('should reject chunk size %p', raw => {
    process.env.TASKS_STREAM_CHUNK_SIZE = raw;

    expect(() => tasksConfig()).toThrow(
      `TASKS_STREAM_CHUNK_SIZE must be a positive integer, got "${raw}"`,
    );
  });

  it.each(['2025-02-30', '15/06/2025', 'today'])('should reject pinned date %p', raw => {
    process.env.TASKS_FIXED_DATE = raw;

    expect(() => tasksConfig()).toThrow(
      `TASKS_FIXED_DATE must be a YYYY-MM-DD calendar date, got "${raw}"`,
    );
  });
});
