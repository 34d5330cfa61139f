import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { JwtStrategy } from './strategies/jwt.strategy.js';
import { IdentityService } from './identity.service.js';
import {
  IDENTITY_DIRECTORY,
  IdentityRepository,
} from './identity.repository.js';

@Module({
  imports: [PassportModule.register({ defaultStrategy: 'jwt' })],
  providers: [
    JwtStrategy,
    IdentityService,
    IdentityRepository,
    { provide: IDENTITY_DIRECTORY, useExisting: IdentityRepository },
  ],
  exports: [IdentityService, IDENTITY_DIRECTORY],
})
export class IdentityModule {}
