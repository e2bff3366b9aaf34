export enum ErrorCode {
  // Authentication errors
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  AUTH_USER_NOT_FOUND = 'AUTH_USER_NOT_FOUND',

  // Task errors
  TASK_NOT_FOUND = 'TASK_NOT_FOUND',
  TASK_ASSIGNEE_NOT_FOUND = 'TASK_ASSIGNEE_NOT_FOUND',
  TASK_ACCESS_DENIED = 'TASK_ACCESS_DENIED',
  TASK_UPDATE_FORBIDDEN = 'TASK_UPDATE_FORBIDDEN',
  TASK_DELETE_FORBIDDEN = 'TASK_DELETE_FORBIDDEN',
  TASK_NOTHING_TO_UPDATE = 'TASK_NOTHING_TO_UPDATE',

  // Batch errors
  BATCH_EMPTY = 'BATCH_EMPTY',
  BATCH_TOO_LARGE = 'BATCH_TOO_LARGE',
  BATCH_DUPLICATE_ID = 'BATCH_DUPLICATE_ID',

  // Validation errors
  VALIDATION_TITLE_REQUIRED = 'VALIDATION_TITLE_REQUIRED',
  VALIDATION_TITLE_LENGTH = 'VALIDATION_TITLE_LENGTH',
  VALIDATION_TITLE_CHARACTERS = 'VALIDATION_TITLE_CHARACTERS',
  VALIDATION_DESCRIPTION_LENGTH = 'VALIDATION_DESCRIPTION_LENGTH',
  VALIDATION_DESCRIPTION_CHARACTERS = 'VALIDATION_DESCRIPTION_CHARACTERS',
  VALIDATION_DUE_DATE_FORMAT = 'VALIDATION_DUE_DATE_FORMAT',
  VALIDATION_DUE_DATE_INVALID = 'VALIDATION_DUE_DATE_INVALID',
  VALIDATION_DUE_DATE_TOO_OLD = 'VALIDATION_DUE_DATE_TOO_OLD',
  VALIDATION_DUE_DATE_TOO_FAR = 'VALIDATION_DUE_DATE_TOO_FAR',
  VALIDATION_DATE_RANGE = 'VALIDATION_DATE_RANGE',
  VALIDATION_PAGE = 'VALIDATION_PAGE',
  VALIDATION_PAGE_SIZE = 'VALIDATION_PAGE_SIZE',
  VALIDATION_SEARCH_QUERY_LENGTH = 'VALIDATION_SEARCH_QUERY_LENGTH',
  VALIDATION_SEARCH_QUERY_FORBIDDEN = 'VALIDATION_SEARCH_QUERY_FORBIDDEN',
  VALIDATION_TASK_ID = 'VALIDATION_TASK_ID',
  VALIDATION_TIMEZONE = 'VALIDATION_TIMEZONE',
  VALIDATION_STATUS = 'VALIDATION_STATUS',
  VALIDATION_PRIORITY = 'VALIDATION_PRIORITY',
}
