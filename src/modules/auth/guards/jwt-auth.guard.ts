import { ExecutionContext, Injectable, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ErrorCode, unauthorized } from '../../../common/errors';
import type { AuthUser } from '../../../common/types';

/**
 * JwtAuthGuard - rejects requests without a valid bearer token and leaves
 * the resolved caller on `request.user`.
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  handleRequest<TUser = AuthUser>(
    err: unknown,
    user: TUser | false,
    info: { message?: string } | undefined,
    context: ExecutionContext,
  ): TUser {
    const { method, url } = context.switchToHttp().getRequest<{ method: string; url: string }>();

    if (err || !user) {
      // Don't expose internal error details to clients
      this.logger.warn(
        `Authentication failed: ${method} ${url} - ${info?.message ?? 'No token provided'}`,
      );
      unauthorized(ErrorCode.AUTH_REQUIRED);
    }

    return user;
  }
}
