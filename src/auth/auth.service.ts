import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { APP_CONFIG, type AppConfig } from '../config/configuration';
import { AuthenticationError } from '../common/errors';
import { DatabaseService } from '../database/database.service';
import { UsersService } from '../users/users.service';
import type { User } from '../users/entities/user.entity';
import type { CurrentUserData } from './decorators/current-user.decorator';
import { verifyPassword } from './password';

export type TokenType = 'access' | 'refresh';

export interface JwtPayload {
  sub: string; // user id
  username: string;
  email: string;
  type: TokenType;
  jti: string;
}

const VerifiedPayloadSchema = z.object({
  sub: z.string().min(1),
  username: z.string(),
  email: z.string(),
  type: z.enum(['access', 'refresh']),
  jti: z.string().min(1),
  exp: z.number(),
});

type VerifiedPayload = z.infer<typeof VerifiedPayloadSchema>;

export interface IssuedTokens {
  accessToken: string;
  refreshToken: string;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly usersService: UsersService,
    private readonly databaseService: DatabaseService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  get passwordAuthEnabled(): boolean {
    return this.config.auth.enablePasswordAuth;
  }

  get refreshTokenMaxAgeMs(): number {
    return this.config.auth.refreshTokenExpireDays * 24 * 60 * 60 * 1000;
  }

  /**
   * Password check. Accounts without a stored hash are rejected before any comparison.
   */
  async authenticate(usernameOrEmail: string, password: string): Promise<User | null> {
    const user = usernameOrEmail.includes('@')
      ? this.usersService.findByEmail(usernameOrEmail)
      : this.usersService.findByUsername(usernameOrEmail);

    if (!user) {
      return null;
    }

    if (user.passwordHash === null || user.passwordHash === '') {
      this.logger.warn(`Password login refused for passwordless account ${user.username}`);
      return null;
    }

    const isValid = await verifyPassword(password, user.passwordHash);
    return isValid ? user : null;
  }

  issueTokens(user: User): IssuedTokens {
    return {
      accessToken: this.createAccessToken(user),
      refreshToken: this.createRefreshToken(user),
    };
  }

  createAccessToken(user: User): string {
    return this.sign(user, 'access', `${this.config.auth.accessTokenExpireMinutes}m`);
  }

  createRefreshToken(user: User): string {
    return this.sign(user, 'refresh', `${this.config.auth.refreshTokenExpireDays}d`);
  }

  async verifyRefreshToken(token: string): Promise<User> {
    const payload = await this.verify(token, 'refresh');
    return this.loadUser(payload);
  }

  /**
   * Called by the JWT strategy with the already signature-checked payload of a bearer token.
   */
  validateAccessPayload(raw: unknown): CurrentUserData {
    const payload = this.parsePayload(raw, 'access');
    const user = this.loadUser(payload);
    return { ...user, token: { jti: payload.jti, expiresAt: new Date(payload.exp * 1000) } };
  }

  async logout(current: CurrentUserData, refreshToken?: string): Promise<void> {
    this.databaseService.revokeToken(current.token.jti, current.token.expiresAt);

    if (refreshToken) {
      try {
        const payload = await this.verify(refreshToken, 'refresh');
        this.databaseService.revokeToken(payload.jti, new Date(payload.exp * 1000));
      } catch (error) {
        // an unusable refresh cookie has nothing left to revoke
        this.logger.debug(`Ignoring invalid refresh token on logout: ${String(error)}`);
      }
    }

    const purged = this.databaseService.purgeExpiredRevokedTokens();
    this.logger.log(`User ${current.username} logged out (${purged} expired revocations purged)`);
  }

  private sign(user: User, type: TokenType, expiresIn: string): string {
    const payload: JwtPayload = {
      sub: user.id,
      username: user.username,
      email: user.email,
      type,
      jti: randomUUID(),
    };
    return this.jwtService.sign(payload, { expiresIn });
  }

  private async verify(token: string, type: TokenType): Promise<VerifiedPayload> {
    let decoded: unknown;
    try {
      decoded = await this.jwtService.verifyAsync<Record<string, unknown>>(token);
    } catch {
      throw new AuthenticationError(`Invalid ${type} token.`);
    }
    return this.parsePayload(decoded, type);
  }

  private parsePayload(raw: unknown, type: TokenType): VerifiedPayload {
    const parsed = VerifiedPayloadSchema.safeParse(raw);
    if (!parsed.success || parsed.data.type !== type) {
      throw new AuthenticationError(`Invalid ${type} token.`);
    }
    if (this.databaseService.isTokenRevoked(parsed.data.jti)) {
      throw new AuthenticationError(`The ${type} token has been revoked.`);
    }
    return parsed.data;
  }

  private loadUser(payload: VerifiedPayload): User {
    const user = this.usersService.findById(payload.sub);
    if (!user) {
      throw new AuthenticationError('User no longer exists.');
    }
    return user;
  }
}
