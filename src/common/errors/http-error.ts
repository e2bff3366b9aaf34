import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { ErrorCode } from './error-codes';
import { ERROR_MESSAGES, ErrorMessageParams, getErrorMessage } from './error-messages';

/**
 * Error response structure with code and message
 */
export interface ErrorResponse {
  code: ErrorCode;
  message: string;
}

function buildResponse(code: ErrorCode, params?: ErrorMessageParams): ErrorResponse {
  const message = params ? getErrorMessage(code, params) : ERROR_MESSAGES[code];
  return { code, message };
}

/**
 * Throws ForbiddenException with error code (authorization failures)
 */
export function forbid(code: ErrorCode, params?: ErrorMessageParams): never {
  throw new ForbiddenException(buildResponse(code, params));
}

/**
 * Throws NotFoundException with error code
 */
export function notFound(code: ErrorCode, params?: ErrorMessageParams): never {
  throw new NotFoundException(buildResponse(code, params));
}

/**
 * Throws UnauthorizedException with error code
 */
export function unauthorized(code: ErrorCode, params?: ErrorMessageParams): never {
  throw new UnauthorizedException(buildResponse(code, params));
}

/**
 * Throws ConflictException with error code
 */
export function conflict(code: ErrorCode, params?: ErrorMessageParams): never {
  throw new ConflictException(buildResponse(code, params));
}

/**
 * Throws BadRequestException with error code (validation failures)
 */
export function badRequest(code: ErrorCode, params?: ErrorMessageParams): never {
  throw new BadRequestException(buildResponse(code, params));
}
