import { Inject, Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import passport, { type Strategy } from 'passport';
import { APP_CONFIG, type AppConfig } from '../config/configuration';
import { ConfigurationError } from '../common/errors';
import {
  OAUTH_PROVIDERS,
  PROVIDER_NAMES,
  type OAuthProviderDefinition,
  type ProviderName,
  type ProviderStrategyOptions,
} from './oauth-providers';

export type OAuthStrategyFactory = (
  definition: OAuthProviderDefinition,
  options: ProviderStrategyOptions,
) => Strategy;

export const OAUTH_STRATEGY_FACTORY = Symbol('OAUTH_STRATEGY_FACTORY');

export const createProviderStrategy: OAuthStrategyFactory = (definition, options) =>
  definition.createStrategy(options);

export interface ProviderEvaluation {
  enabled: Set<ProviderName>;
  errors: ConfigurationError[];
}

/**
 * A provider is enabled when every credential it needs is non-empty.
 * Partially configured providers stay disabled and yield a ConfigurationError.
 */
export function evaluateProviders(config: AppConfig): ProviderEvaluation {
  const enabled = new Set<ProviderName>();
  const errors: ConfigurationError[] = [];

  for (const name of PROVIDER_NAMES) {
    const definition = OAUTH_PROVIDERS[name];
    const fields = definition.credentials(config);
    const missing = fields.filter((field) => field.value === '').map((field) => field.env);

    if (missing.length === 0) {
      enabled.add(name);
    } else if (missing.length < fields.length) {
      errors.push(
        new ConfigurationError(
          `${definition.displayName} OAuth is partially configured and stays disabled; missing ${missing.join(', ')}`,
          name,
        ),
      );
    }
  }

  return { enabled, errors };
}

export function enabledProviders(config: AppConfig): Set<ProviderName> {
  return evaluateProviders(config).enabled;
}

export function callbackUri(config: AppConfig, provider: ProviderName): string {
  return `${config.backendHost}/api/v1/callback/${provider}`;
}

/**
 * Registers one passport strategy per enabled provider, named `oauth-<provider>`.
 */
@Injectable()
export class ProviderRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(ProviderRegistry.name);
  private readonly enabled: Set<ProviderName>;

  constructor(
    @Inject(APP_CONFIG) config: AppConfig,
    @Inject(OAUTH_STRATEGY_FACTORY) createStrategy: OAuthStrategyFactory,
  ) {
    const { enabled, errors } = evaluateProviders(config);
    this.enabled = enabled;

    for (const error of errors) {
      this.logger.error(error.message);
    }

    for (const name of enabled) {
      const definition = OAUTH_PROVIDERS[name];
      const credentials = config.oauth[name];
      passport.use(
        strategyName(name),
        createStrategy(definition, {
          clientID: credentials.clientId,
          clientSecret: credentials.clientSecret,
          callbackURL: callbackUri(config, name),
          endpoints: definition.endpoints(config),
        }),
      );
    }

    if (enabled.size > 0 && config.auth.enablePasswordAuth) {
      this.logger.warn(
        'Password authentication and OAuth are both enabled. ' +
          'For OAuth-only deployments set ENABLE_PASSWORD_AUTH=false.',
      );
    }

    this.logger.log(
      enabled.size > 0
        ? `OAuth providers enabled: ${[...enabled].join(', ')}`
        : 'No OAuth providers configured',
    );
  }

  onModuleDestroy() {
    for (const name of this.enabled) {
      passport.unuse(strategyName(name));
    }
  }

  get enabledProviders(): ProviderName[] {
    return [...this.enabled];
  }

  isEnabled(provider: string): provider is ProviderName {
    return PROVIDER_NAMES.some((name) => name === provider && this.enabled.has(name));
  }
}

export function strategyName(provider: ProviderName): string {
  return `oauth-${provider}`;
}
