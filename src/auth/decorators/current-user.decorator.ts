import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import type { User } from '../../users/entities/user.entity';

export type CurrentUserData = User & {
  token: { jti: string; expiresAt: Date };
};

function isCurrentUserData(value: unknown): value is CurrentUserData {
  return typeof value === 'object' && value !== null && 'id' in value && 'token' in value;
}

export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): CurrentUserData => {
    const request = ctx.switchToHttp().getRequest<Request>();
    if (!isCurrentUserData(request.user)) {
      throw new UnauthorizedException();
    }
    return request.user;
  },
);
