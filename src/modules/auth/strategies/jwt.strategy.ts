import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import jwtConfig from '../../../config/jwt.config';
import { ErrorCode, unauthorized } from '../../../common/errors';
import type { AuthUser } from '../../../common/types';
import type { IUsersRepository } from '../../users/users.repository.interface';
import { USERS_REPOSITORY } from '../../users/users.repository.interface';
import { JwtPayload } from '../interfaces/auth.interface';

/**
 * JwtStrategy - Verifies bearer tokens and resolves the caller
 *
 * Tokens are issued elsewhere; this strategy only checks the signature and
 * expiry, then loads the user so that role changes apply immediately.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    @Inject(jwtConfig.KEY)
    config: ConfigType<typeof jwtConfig>,
    @Inject(USERS_REPOSITORY)
    private readonly usersRepository: IUsersRepository,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: config.secret,
    });
  }

  async validate(payload: JwtPayload): Promise<AuthUser> {
    const user = await this.usersRepository.findById(payload.sub);

    if (!user) {
      unauthorized(ErrorCode.AUTH_USER_NOT_FOUND);
    }

    return {
      id: user.id,
      role: user.role,
    };
  }
}
