import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { UsersModule } from '../users/users.module';
import { OAuthProviderGuard } from './guards/oauth-provider.guard';
import { OAuthController } from './oauth.controller';
import { OAuthService } from './oauth.service';
import { createProviderStrategy, OAUTH_STRATEGY_FACTORY, ProviderRegistry } from './provider-registry';

@Module({
  imports: [AuthModule, UsersModule],
  controllers: [OAuthController],
  providers: [
    { provide: OAUTH_STRATEGY_FACTORY, useValue: createProviderStrategy },
    ProviderRegistry,
    OAuthService,
    OAuthProviderGuard,
  ],
  exports: [ProviderRegistry],
})
export class OAuthModule {}
