import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { AuthenticationError } from '../../common/errors';
import { isOAuthProfile, type OAuthProfile } from '../oauth-providers';

/**
 * The provider profile that OAuthProviderGuard left on the request.
 */
export const ProviderProfile = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): OAuthProfile => {
    const request = ctx.switchToHttp().getRequest<Request>();
    if (!isOAuthProfile(request.user)) {
      throw new AuthenticationError('OAuth sign-in did not produce a profile.');
    }
    return request.user;
  },
);
