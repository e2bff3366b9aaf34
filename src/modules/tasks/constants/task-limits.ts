export const TASK_LIMITS = {
  TITLE_MIN_LENGTH: 3,
  TITLE_MAX_LENGTH: 200,
  DESCRIPTION_MAX_LENGTH: 2000,
  DUE_DATE_MIN_YEAR: 2000,
  DUE_DATE_MAX_YEAR: 2100,
  DUE_DATE_MAX_YEARS_PAST: 1,
  DUE_DATE_MAX_YEARS_FUTURE: 10,
  SEARCH_QUERY_MIN_LENGTH: 2,
  SEARCH_QUERY_MAX_LENGTH: 100,
  TASK_ID_MIN_LENGTH: 10,
  DEFAULT_PAGE_SIZE: 10,
  MAX_PAGE_SIZE: 100,
  MAX_BATCH_SIZE: 50,
} as const;
