import { ErrorCode } from './error-codes';

export type ErrorMessageParams = Record<string, string | number>;

/**
 * Centralized error messages mapped to error codes
 * Placeholders in braces are filled by getErrorMessage
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  // Authentication errors
  [ErrorCode.AUTH_REQUIRED]: 'User not authenticated',
  [ErrorCode.AUTH_USER_NOT_FOUND]: 'User not found',

  // Task errors
  [ErrorCode.TASK_NOT_FOUND]: 'Task {id} not found',
  [ErrorCode.TASK_ASSIGNEE_NOT_FOUND]: 'Assigned user {id} not found',
  [ErrorCode.TASK_ACCESS_DENIED]: 'You do not have permission to access this task',
  [ErrorCode.TASK_UPDATE_FORBIDDEN]: 'Only the creator or the assignee can update this task',
  [ErrorCode.TASK_DELETE_FORBIDDEN]: 'Only the creator can delete this task',
  [ErrorCode.TASK_NOTHING_TO_UPDATE]: 'Nothing to update',

  // Batch errors
  [ErrorCode.BATCH_EMPTY]: 'At least one task ID is required',
  [ErrorCode.BATCH_TOO_LARGE]: 'Cannot process more than {max} tasks at once',
  [ErrorCode.BATCH_DUPLICATE_ID]: 'Duplicate task ID in batch: {id}',

  // Validation errors
  [ErrorCode.VALIDATION_TITLE_REQUIRED]: 'Task title is required',
  [ErrorCode.VALIDATION_TITLE_LENGTH]: 'Task title must be between {min} and {max} characters',
  [ErrorCode.VALIDATION_TITLE_CHARACTERS]: 'Task title contains invalid characters',
  [ErrorCode.VALIDATION_DESCRIPTION_LENGTH]: 'Task description must be at most {max} characters',
  [ErrorCode.VALIDATION_DESCRIPTION_CHARACTERS]: 'Task description contains invalid characters',
  [ErrorCode.VALIDATION_DUE_DATE_FORMAT]: 'Due date must use the YYYY-MM-DD format',
  [ErrorCode.VALIDATION_DUE_DATE_INVALID]: 'Due date {date} is not a valid calendar date',
  [ErrorCode.VALIDATION_DUE_DATE_TOO_OLD]: 'Due date cannot be more than 1 year in the past',
  [ErrorCode.VALIDATION_DUE_DATE_TOO_FAR]: 'Due date cannot be more than 10 years in the future',
  [ErrorCode.VALIDATION_DATE_RANGE]: 'startDate must not be after endDate',
  [ErrorCode.VALIDATION_PAGE]: 'page must be at least 1',
  [ErrorCode.VALIDATION_PAGE_SIZE]: 'pageSize must be between 1 and {max}',
  [ErrorCode.VALIDATION_SEARCH_QUERY_LENGTH]:
    'Search query must be between {min} and {max} characters',
  [ErrorCode.VALIDATION_SEARCH_QUERY_FORBIDDEN]: 'Search query contains forbidden content',
  [ErrorCode.VALIDATION_TASK_ID]: 'Invalid task ID: {id}',
  [ErrorCode.VALIDATION_TIMEZONE]: 'Unsupported timezone: {timezone}',
  [ErrorCode.VALIDATION_STATUS]: 'status must be one of: {allowed}',
  [ErrorCode.VALIDATION_PRIORITY]: 'priority must be one of: {allowed}',
};

/**
 * Get error message with optional dynamic parameters
 * @param code Error code
 * @param params Optional parameters for message interpolation
 */
export function getErrorMessage(code: ErrorCode, params?: ErrorMessageParams): string {
  let message = ERROR_MESSAGES[code];

  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      message = message.replace(`{${key}}`, String(value));
    });
  }

  return message;
}
