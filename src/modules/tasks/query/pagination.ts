import { Logger } from '@nestjs/common';
import { TASK_LIMITS } from '../constants/task-limits';
import { PaginationInfo, TaskFilterOptions } from '../interfaces/task-results.interface';
import { validatePagination } from '../validation/task.validators';

export interface PageRequest {
  page: number;
  pageSize: number;
  skip: number;
}

function toWholeNumber(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.trunc(value);
}

/**
 * Clamps client pagination into range instead of rejecting it:
 * page >= 1, 1 <= pageSize <= 100.
 */
export function clampPagination(page?: number, pageSize?: number): PageRequest {
  const safePage = Math.max(1, toWholeNumber(page, 1));
  const safePageSize = Math.min(
    TASK_LIMITS.MAX_PAGE_SIZE,
    Math.max(1, toWholeNumber(pageSize, TASK_LIMITS.DEFAULT_PAGE_SIZE)),
  );

  return {
    page: safePage,
    pageSize: safePageSize,
    skip: (safePage - 1) * safePageSize,
  };
}

/**
 * Page request for a list/search call; out-of-range input is clamped and
 * only noted in the debug log.
 */
export function resolvePageRequest(options: TaskFilterOptions, logger: Logger): PageRequest {
  const violation = validatePagination(
    options.page ?? 1,
    options.pageSize ?? TASK_LIMITS.DEFAULT_PAGE_SIZE,
  );
  const request = clampPagination(options.page, options.pageSize);

  if (violation) {
    logger.debug(
      `Clamped pagination to page=${request.page} pageSize=${request.pageSize}: ${violation.message}`,
    );
  }

  return request;
}

export function buildPaginationInfo(
  page: number,
  pageSize: number,
  totalItems: number,
): PaginationInfo {
  const totalPages = totalItems === 0 ? 1 : Math.ceil(totalItems / pageSize);

  return {
    page,
    pageSize,
    totalItems,
    totalPages,
    hasNext: page < totalPages,
    hasPrevious: page > 1,
  };
}
