import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import type { AppConfig } from '../../../common/config/env.validation.js';
import {
  isAccountRole,
  type AccountPrincipal,
} from '../account-principal.js';

interface JwtPayload {
  sub?: unknown;
  role?: unknown;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService<AppConfig, true>) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get('JWT_SECRET', { infer: true }),
    });
  }

  validate(payload: JwtPayload): AccountPrincipal {
    if (typeof payload.sub !== 'string' || !isAccountRole(payload.role)) {
      throw new UnauthorizedException('Malformed access token');
    }
    return { accountId: payload.sub, role: payload.role };
  }
}
