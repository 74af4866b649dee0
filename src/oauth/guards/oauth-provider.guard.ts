import {
  CanActivate,
  ExecutionContext,
  HttpException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import passport from 'passport';
import { AuthenticationError } from '../../common/errors';
import { APP_CONFIG, type AppConfig } from '../../config/configuration';
import { OAUTH_PROVIDERS, type ProviderName } from '../oauth-providers';
import { ProviderRegistry, strategyName } from '../provider-registry';

/**
 * Runs the provider's passport strategy for `/login/:provider` and `/callback/:provider`.
 *
 * Login ends in the strategy's redirect to the provider. On callback the strategy
 * checks the state, exchanges the code and loads the profile into `request.user`.
 * Disabled or unknown providers get the router's own 404.
 */
@Injectable()
export class OAuthProviderGuard implements CanActivate {
  private readonly logger = new Logger(OAuthProviderGuard.name);

  constructor(
    private readonly registry: ProviderRegistry,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const provider = request.params.provider;
    if (!this.registry.isEnabled(provider)) {
      throw new NotFoundException(`Cannot ${request.method} ${request.originalUrl || request.url}`);
    }

    request.user = await this.authenticate(provider, request, response);
    return true;
  }

  private authenticate(provider: ProviderName, request: Request, response: Response): Promise<Express.User> {
    const { displayName } = OAUTH_PROVIDERS[provider];
    const invalidResponse = () => new AuthenticationError(`Invalid response from ${displayName} OAuth.`);

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.logger.error(`${displayName} OAuth did not answer within ${this.config.oauth.httpTimeoutMs}ms`);
        reject(invalidResponse());
      }, this.config.oauth.httpTimeoutMs);
      // A login request ends with the redirect and never settles
      response.once('finish', () => clearTimeout(timer));

      const settle = (error: unknown, user?: Express.User) => {
        clearTimeout(timer);
        if (user) {
          resolve(user);
        } else if (error instanceof HttpException) {
          reject(error);
        } else {
          this.logger.error(`${displayName} OAuth failed: ${describeError(error)}`);
          reject(invalidResponse());
        }
      };

      const middleware = passport.authenticate(
        strategyName(provider),
        { session: false },
        (error: unknown, user: Express.User | false | null | undefined, info: unknown) => {
          if (error || user) {
            settle(error, user || undefined);
            return;
          }
          clearTimeout(timer);
          reject(new AuthenticationError(failureMessage(info, displayName)));
        },
      );
      middleware(request, response, (error?: unknown) => settle(error ?? new Error('Strategy passed the request')));
    });
  }
}

function failureMessage(info: unknown, displayName: string): string {
  if (typeof info === 'object' && info !== null) {
    const message: unknown = Reflect.get(info, 'message');
    if (typeof message === 'string' && message.length > 0) return message;
  }
  return `${displayName} sign-in was not completed.`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
