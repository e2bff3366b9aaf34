export { ErrorCode } from './error-codes';
export { ERROR_MESSAGES, getErrorMessage } from './error-messages';
export type { ErrorMessageParams } from './error-messages';
export { forbid, notFound, unauthorized, conflict, badRequest } from './http-error';
export type { ErrorResponse } from './http-error';
