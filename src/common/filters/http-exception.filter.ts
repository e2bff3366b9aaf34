import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { QueryFailedError } from 'typeorm';
import type { ErrorResponseBody } from '../types';

interface ErrorDescription {
  status: number;
  message: string;
  code?: string;
  details?: unknown;
}

const DATABASE_ERRORS: Record<string, { status: number; message: string }> = {
  '23505': { status: HttpStatus.CONFLICT, message: 'Duplicate entry. This record already exists.' },
  '23503': { status: HttpStatus.BAD_REQUEST, message: 'Referenced record does not exist.' },
  '23502': { status: HttpStatus.BAD_REQUEST, message: 'Required field is missing.' },
  '22P02': { status: HttpStatus.BAD_REQUEST, message: 'Invalid data format provided.' },
};

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Formats every error as `{ success: false, error: true, ... }`.
 * Client errors are logged as warnings, server errors with their stack;
 * internal details are hidden in production.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, message, code, details } = this.describe(exception, request.url);
    const isProduction = process.env.NODE_ENV === 'production';

    const body: ErrorResponseBody = {
      success: false,
      error: true,
      statusCode: status,
      message,
      path: request.url,
      timestamp: new Date().toISOString(),
    };

    if (code) {
      body.code = code;
    }

    if (details !== undefined && (status < 500 || !isProduction)) {
      body.details = details;
    }

    const requestId = request.headers['x-request-id'];
    if (typeof requestId === 'string') {
      body.requestId = requestId;
    }

    response.status(status).json(body);
  }

  describe(exception: unknown, path: string): ErrorDescription {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      let message = exception.message;
      let code: string | undefined;
      let details: unknown;

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        code = readString(exceptionResponse, 'code');
        // ValidationPipe reports its messages as an array.
        const messages: unknown = Reflect.get(exceptionResponse, 'message');
        if (Array.isArray(messages)) {
          message = 'Validation failed';
          details = { errors: messages };
        }
      }

      if (status >= 500) {
        this.logger.error(`HTTP Exception: ${status} - ${message} - Path: ${path}`);
      } else {
        this.logger.warn(`HTTP Exception: ${status} - ${message} - Path: ${path}`);
      }

      return { status, message, code, details };
    }

    if (exception instanceof QueryFailedError) {
      const driverCode = readString(exception.driverError, 'code') ?? 'unknown';
      const known = DATABASE_ERRORS[driverCode];

      this.logger.error(
        `Database Error: ${driverCode} - ${exception.message} - Path: ${path}`,
        exception.stack,
      );

      return known ?? {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Database operation failed.',
      };
    }

    if (exception instanceof Error) {
      this.logger.error(
        `Unexpected Error: ${exception.name} - ${exception.message} - Path: ${path}`,
        exception.stack,
      );

      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message:
          process.env.NODE_ENV === 'production' ? 'An unexpected error occurred' : exception.message,
      };
    }

    this.logger.error(`Unknown Error Type: ${typeof exception} - Path: ${path}`, String(exception));

    return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal server error' };
  }
}
