import {
  Body,
  Controller,
  ForbiddenException,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { AuthenticationError } from '../common/errors';
import { AuthService } from './auth.service';
import { LoginDto, TokenResponseDto } from './dto/auth.dto';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { CurrentUser, type CurrentUserData } from './decorators/current-user.decorator';
import {
  REFRESH_TOKEN_COOKIE,
  clearRefreshTokenCookie,
  readCookie,
  setRefreshTokenCookie,
} from './cookies';

@Controller()
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(
    @Body() dto: LoginDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<TokenResponseDto> {
    if (!this.authService.passwordAuthEnabled) {
      throw new ForbiddenException('Password authentication is disabled');
    }

    const user = await this.authService.authenticate(dto.username, dto.password);
    if (!user) {
      throw new AuthenticationError('Wrong username, email or password.');
    }

    const tokens = this.authService.issueTokens(user);
    setRefreshTokenCookie(res, tokens.refreshToken, this.authService.refreshTokenMaxAgeMs);
    return { access_token: tokens.accessToken, token_type: 'bearer' };
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Req() req: Request): Promise<TokenResponseDto> {
    const refreshToken = readCookie(req, REFRESH_TOKEN_COOKIE);
    if (!refreshToken) {
      throw new AuthenticationError('Refresh token missing.');
    }

    const user = await this.authService.verifyRefreshToken(refreshToken);
    return { access_token: this.authService.createAccessToken(user), token_type: 'bearer' };
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  async logout(
    @CurrentUser() user: CurrentUserData,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ) {
    await this.authService.logout(user, readCookie(req, REFRESH_TOKEN_COOKIE));
    clearRefreshTokenCookie(res);
    return { message: 'Logged out successfully' };
  }
}
