import { BadRequestException } from '@nestjs/common';
import { ErrorCode, ErrorMessageParams, getErrorMessage } from '../../../common/errors';
import { TASK_LIMITS } from '../constants/task-limits';
import { SUPPORTED_TIMEZONES } from '../constants/timezones';
import { TaskPriority } from '../enums/task-priority.enum';
import { TaskStatus } from '../enums/task-status.enum';
import { isCalendarDate, parseCalendarDate, shiftYears } from '../../../common/utils/calendar-date.util';

/**
 * Pure input checks for task operations. Each validator returns the first
 * violation it finds, or null when the value is acceptable.
 */
export interface TaskValidationError {
  code: ErrorCode;
  message: string;
}

const FORBIDDEN_TEXT_CHARACTERS = /[<>"'&]/;
const TASK_ID_PATTERN = /^[0-9a-fA-F-]+$/;
const FORBIDDEN_QUERY_TOKENS = ["'", '"', ';', '--', '/*', '*/'];
const FORBIDDEN_QUERY_KEYWORDS = /\b(drop|delete|insert|update|select)\b/i;

function failure(code: ErrorCode, params?: ErrorMessageParams): TaskValidationError {
  return { code, message: getErrorMessage(code, params) };
}

export function validateTitle(title: string): TaskValidationError | null {
  const trimmed = title.trim();

  if (trimmed.length === 0) {
    return failure(ErrorCode.VALIDATION_TITLE_REQUIRED);
  }

  if (
    trimmed.length < TASK_LIMITS.TITLE_MIN_LENGTH ||
    trimmed.length > TASK_LIMITS.TITLE_MAX_LENGTH
  ) {
    return failure(ErrorCode.VALIDATION_TITLE_LENGTH, {
      min: TASK_LIMITS.TITLE_MIN_LENGTH,
      max: TASK_LIMITS.TITLE_MAX_LENGTH,
    });
  }

  if (FORBIDDEN_TEXT_CHARACTERS.test(trimmed)) {
    return failure(ErrorCode.VALIDATION_TITLE_CHARACTERS);
  }

  return null;
}

export function validateDescription(description: string): TaskValidationError | null {
  if (description.length > TASK_LIMITS.DESCRIPTION_MAX_LENGTH) {
    return failure(ErrorCode.VALIDATION_DESCRIPTION_LENGTH, {
      max: TASK_LIMITS.DESCRIPTION_MAX_LENGTH,
    });
  }

  if (FORBIDDEN_TEXT_CHARACTERS.test(description)) {
    return failure(ErrorCode.VALIDATION_DESCRIPTION_CHARACTERS);
  }

  return null;
}

/**
 * Checks the YYYY-MM-DD shape and the real calendar (month lengths, leap
 * years), without any reference to the current date.
 */
export function validateCalendarDate(value: string): TaskValidationError | null {
  if (!parseCalendarDate(value)) {
    return failure(ErrorCode.VALIDATION_DUE_DATE_FORMAT);
  }

  if (!isCalendarDate(value, TASK_LIMITS.DUE_DATE_MIN_YEAR, TASK_LIMITS.DUE_DATE_MAX_YEAR)) {
    return failure(ErrorCode.VALIDATION_DUE_DATE_INVALID, { date: value });
  }

  return null;
}

/**
 * Calendar check plus the allowed window around `today`: at most one
 * calendar year back and ten years ahead.
 */
export function validateDueDate(value: string, today: string): TaskValidationError | null {
  const calendarError = validateCalendarDate(value);
  if (calendarError) {
    return calendarError;
  }

  if (value < shiftYears(today, -TASK_LIMITS.DUE_DATE_MAX_YEARS_PAST)) {
    return failure(ErrorCode.VALIDATION_DUE_DATE_TOO_OLD);
  }

  if (value > shiftYears(today, TASK_LIMITS.DUE_DATE_MAX_YEARS_FUTURE)) {
    return failure(ErrorCode.VALIDATION_DUE_DATE_TOO_FAR);
  }

  return null;
}

export function validateDateRange(
  startDate: string | undefined,
  endDate: string | undefined,
): TaskValidationError | null {
  for (const value of [startDate, endDate]) {
    if (value !== undefined) {
      const error = validateCalendarDate(value);
      if (error) {
        return error;
      }
    }
  }

  if (startDate !== undefined && endDate !== undefined && startDate > endDate) {
    return failure(ErrorCode.VALIDATION_DATE_RANGE);
  }

  return null;
}

export function validatePagination(page: number, pageSize: number): TaskValidationError | null {
  if (!Number.isInteger(page) || page < 1) {
    return failure(ErrorCode.VALIDATION_PAGE);
  }

  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > TASK_LIMITS.MAX_PAGE_SIZE) {
    return failure(ErrorCode.VALIDATION_PAGE_SIZE, { max: TASK_LIMITS.MAX_PAGE_SIZE });
  }

  return null;
}

/**
 * The token blacklist is a compatibility heuristic, not an injection guard:
 * store access is parameterised either way.
 */
export function validateSearchQuery(query: string): TaskValidationError | null {
  const trimmed = query.trim();

  if (
    trimmed.length < TASK_LIMITS.SEARCH_QUERY_MIN_LENGTH ||
    trimmed.length > TASK_LIMITS.SEARCH_QUERY_MAX_LENGTH
  ) {
    return failure(ErrorCode.VALIDATION_SEARCH_QUERY_LENGTH, {
      min: TASK_LIMITS.SEARCH_QUERY_MIN_LENGTH,
      max: TASK_LIMITS.SEARCH_QUERY_MAX_LENGTH,
    });
  }

  if (
    FORBIDDEN_QUERY_TOKENS.some(token => trimmed.includes(token)) ||
    FORBIDDEN_QUERY_KEYWORDS.test(trimmed)
  ) {
    return failure(ErrorCode.VALIDATION_SEARCH_QUERY_FORBIDDEN);
  }

  return null;
}

export function validateTaskId(id: string): TaskValidationError | null {
  if (id.length < TASK_LIMITS.TASK_ID_MIN_LENGTH || !TASK_ID_PATTERN.test(id)) {
    return failure(ErrorCode.VALIDATION_TASK_ID, { id });
  }

  return null;
}

export function validateTimezone(timezone: string): TaskValidationError | null {
  if (!SUPPORTED_TIMEZONES.includes(timezone)) {
    return failure(ErrorCode.VALIDATION_TIMEZONE, { timezone });
  }

  return null;
}

export function isTaskStatus(value: string): value is TaskStatus {
  return Object.values<string>(TaskStatus).includes(value);
}

export function isTaskPriority(value: string): value is TaskPriority {
  return Object.values<string>(TaskPriority).includes(value);
}

export function validateTaskStatus(value: string): TaskValidationError | null {
  return isTaskStatus(value)
    ? null
    : failure(ErrorCode.VALIDATION_STATUS, { allowed: Object.values(TaskStatus).join(', ') });
}

export function validateTaskPriority(value: string): TaskValidationError | null {
  return isTaskPriority(value)
    ? null
    : failure(ErrorCode.VALIDATION_PRIORITY, { allowed: Object.values(TaskPriority).join(', ') });
}

/**
 * Raises the validation failure as a 400, keeping its code.
 */
export function ensureValid(error: TaskValidationError | null): void {
  if (error) {
    throw new BadRequestException({ code: error.code, message: error.message });
  }
}
