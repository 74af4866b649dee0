import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { isEmail } from 'class-validator';
import { AuthenticationError, UniqueConstraintError } from '../common/errors';
import { UsersService } from '../users/users.service';
import { deriveUsername } from '../users/username';
import type { User } from '../users/entities/user.entity';
import { OAUTH_PROVIDERS, type OAuthProfile } from './oauth-providers';

export interface ResolvedUser {
  user: User;
  created: boolean;
}

@Injectable()
export class OAuthService {
  private readonly logger = new Logger(OAuthService.name);

  constructor(private readonly usersService: UsersService) {}

  /**
   * Finds the local account for a provider profile, creating a passwordless one on first login.
   * An existing account is returned as stored; name and avatar are not refreshed.
   */
  async resolveUser(profile: OAuthProfile): Promise<ResolvedUser> {
    const { displayName } = OAUTH_PROVIDERS[profile.provider];
    const email = profile.email;
    if (!email || !isEmail(email)) {
      this.logger.warn(`${displayName} profile carried no usable email`);
      throw new AuthenticationError(`Invalid response from ${displayName} OAuth.`);
    }

    const existing = this.usersService.findByEmail(email);
    if (existing) {
      return { user: existing, created: false };
    }

    const username = deriveUsername(email);

    try {
      const user = this.usersService.create({
        name: profile.displayName || username,
        username,
        email,
        passwordHash: null,
        profileImageUrl: profile.avatarUrl,
      });
      this.logger.log(`Created ${displayName} OAuth user ${user.username}`);
      return { user, created: true };
    } catch (error) {
      if (!(error instanceof UniqueConstraintError)) {
        throw error;
      }

      // Concurrent first login for the same email: the stored row wins
      const winner = this.usersService.findByEmail(email);
      if (winner) {
        this.logger.log(`Recovered concurrent signup for ${winner.username}`);
        return { user: winner, created: false };
      }

      this.logger.warn(`Username ${username} is taken by another account`);
      throw new ConflictException('Username not available');
    }
  }
}
