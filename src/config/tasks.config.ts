import { registerAs } from '@nestjs/config';
import { isCalendarDate } from '../common/utils/calendar-date.util';

const DEFAULT_STREAM_CHUNK_SIZE = 500;

function readStreamChunkSize(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_STREAM_CHUNK_SIZE;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`TASKS_STREAM_CHUNK_SIZE must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readFixedDate(raw: string | undefined): string | undefined {
  if (!raw) {
    return undefined;
  }

  if (!isCalendarDate(raw, 1, 9999)) {
    throw new Error(`TASKS_FIXED_DATE must be a YYYY-MM-DD calendar date, got "${raw}"`);
  }
  return raw;
}

export default registerAs('tasks', () => ({
  // Pins "today" (YYYY-MM-DD) for overdue and due-date window checks.
  fixedDate: readFixedDate(process.env.TASKS_FIXED_DATE),
  streamChunkSize: readStreamChunkSize(process.env.TASKS_STREAM_CHUNK_SIZE),
  defaultTimezone: process.env.TASKS_DEFAULT_TIMEZONE || 'UTC',
}));
