import { Controller, Get, Res, UseGuards } from '@nestjs/common';
import type { Response } from 'express';
import { AuthService } from '../auth/auth.service';
import type { TokenResponseDto } from '../auth/dto/auth.dto';
import { setRefreshTokenCookie } from '../auth/cookies';
import { ProviderProfile } from './decorators/provider-profile.decorator';
import { OAuthProviderGuard } from './guards/oauth-provider.guard';
import { OAuthService } from './oauth.service';
import type { OAuthProfile } from './oauth-providers';

/** Signed session cookie carrying the OAuth state between login and callback. */
export const OAUTH_STATE_COOKIE = 'oauth_state';

export const OAUTH_STATE_TTL_MS = 10 * 60 * 1000;

@Controller()
@UseGuards(OAuthProviderGuard)
export class OAuthController {
  constructor(
    private readonly oauthService: OAuthService,
    private readonly authService: AuthService,
  ) {}

  @Get('login/:provider')
  login() {
    // Guard redirects to the provider
  }

  @Get('callback/:provider')
  async callback(
    @ProviderProfile() profile: OAuthProfile,
    @Res({ passthrough: true }) res: Response,
  ): Promise<TokenResponseDto> {
    const { user } = await this.oauthService.resolveUser(profile);

    const tokens = this.authService.issueTokens(user);
    setRefreshTokenCookie(res, tokens.refreshToken, this.authService.refreshTokenMaxAgeMs);
    return { access_token: tokens.accessToken, token_type: 'bearer' };
  }
}
