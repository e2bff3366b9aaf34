import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthUser } from '../../../common/types';

/**
 * CurrentUser Decorator - Extracts the caller set by JwtAuthGuard
 *
 * Usage:
 * @Get()
 * async list(@CurrentUser() user: AuthUser) {
 *   return this.tasksService.listTasks(user);
 * }
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthUser | undefined => {
    const request = ctx.switchToHttp().getRequest<{ user?: AuthUser }>();
    return request.user;
  },
);
