export type { AuthUser } from './auth.types';

export interface ApiResponse<T> {
  success: true;
  message?: string;
  data: T;
}

export interface ErrorResponseBody {
  success: false;
  error: true;
  statusCode: number;
  code?: string;
  message: string;
  path: string;
  timestamp: string;
  details?: unknown;
  requestId?: string;
}
