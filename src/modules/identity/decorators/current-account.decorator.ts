import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { AccountPrincipal } from '../account-principal.js';

export const CurrentAccount = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AccountPrincipal => {
    const request = ctx
      .switchToHttp()
      .getRequest<{ user?: AccountPrincipal }>();
    if (!request.user) {
      throw new UnauthorizedException('Missing authenticated account');
    }
    return request.user;
  },
);
