import type { Strategy } from 'passport';
import { Strategy as GoogleStrategy, type Profile as GoogleProfile } from 'passport-google-oauth20';
import type { VerifyCallback } from 'passport-oauth2';
import { z } from 'zod';
import type { AppConfig } from '../config/configuration';
import { ProviderOAuth2Strategy } from './strategies/provider-oauth2.strategy';

export const PROVIDER_NAMES = ['github', 'google', 'microsoft'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface OAuthProfile {
  provider: ProviderName;
  email: string | null;
  displayName: string | null;
  avatarUrl: string | null;
}

export type ProfileFields = Omit<OAuthProfile, 'provider'>;

/** Authenticated GET against the provider API, resolving to the parsed JSON body. */
export type FetchJson = (url: string) => Promise<unknown>;

export type ProfileReader = (
  userInfo: unknown,
  fetchJson: FetchJson,
  userProfileURL: string,
) => Promise<ProfileFields>;

export interface OAuthEndpoints {
  authorizationURL: string;
  tokenURL: string;
  userProfileURL: string;
}

export interface CredentialField {
  env: string;
  value: string;
}

export interface ProviderStrategyOptions {
  clientID: string;
  clientSecret: string;
  callbackURL: string;
  endpoints: OAuthEndpoints;
}

export interface OAuthProviderDefinition {
  name: ProviderName;
  displayName: string;
  scopes: string[];
  credentials(config: AppConfig): CredentialField[];
  endpoints(config: AppConfig): OAuthEndpoints;
  /** Passport strategy whose verify step yields an OAuthProfile as the authenticated user. */
  createStrategy(options: ProviderStrategyOptions): Strategy;
}

export function isOAuthProfile(value: unknown): value is OAuthProfile {
  if (typeof value !== 'object' || value === null) return false;
  const provider: unknown = Reflect.get(value, 'provider');
  return (
    PROVIDER_NAMES.some((name) => name === provider) &&
    ['email', 'displayName', 'avatarUrl'].every((key) => {
      const field: unknown = Reflect.get(value, key);
      return field === null || typeof field === 'string';
    })
  );
}

const GithubUserSchema = z.object({
  login: z.string(),
  name: z.string().nullish(),
  email: z.string().nullish(),
  avatar_url: z.string().nullish(),
});

const GithubEmailsSchema = z.array(
  z.object({
    email: z.string(),
    primary: z.boolean(),
    verified: z.boolean(),
  }),
);

const MicrosoftUserSchema = z.object({
  mail: z.string().nullish(),
  displayName: z.string().nullish(),
});

export const readGithubProfile: ProfileReader = async (userInfo, fetchJson, userProfileURL) => {
  const user = GithubUserSchema.parse(userInfo);
  let email = user.email ?? null;

  // Private email addresses are only listed by the emails endpoint
  if (!email) {
    const emails = GithubEmailsSchema.parse(await fetchJson(`${userProfileURL}/emails`));
    email = emails.find((entry) => entry.primary && entry.verified)?.email ?? null;
  }

  return {
    email,
    displayName: user.name ?? user.login,
    avatarUrl: user.avatar_url ?? null,
  };
};

export const readMicrosoftProfile: ProfileReader = async (userInfo) => {
  const user = MicrosoftUserSchema.parse(userInfo);
  return {
    email: user.mail ?? null,
    displayName: user.displayName ?? null,
    avatarUrl: null,
  };
};

export function fromGoogleProfile(profile: GoogleProfile): OAuthProfile {
  return {
    provider: 'google',
    email: profile.emails?.[0]?.value ?? null,
    displayName: profile.displayName || null,
    avatarUrl: profile.photos?.[0]?.value ?? null,
  };
}

const github: OAuthProviderDefinition = {
  name: 'github',
  displayName: 'GitHub',
  scopes: ['read:user', 'user:email'],
  credentials: (config) => [
    { env: 'GITHUB_CLIENT_ID', value: config.oauth.github.clientId },
    { env: 'GITHUB_CLIENT_SECRET', value: config.oauth.github.clientSecret },
  ],
  endpoints: () => ({
    authorizationURL: 'https://github.com/login/oauth/authorize',
    tokenURL: 'https://github.com/login/oauth/access_token',
    userProfileURL: 'https://api.github.com/user',
  }),
  createStrategy: (options) =>
    new ProviderOAuth2Strategy({
      ...options,
      provider: 'github',
      scope: github.scopes,
      readProfile: readGithubProfile,
    }),
};

const google: OAuthProviderDefinition = {
  name: 'google',
  displayName: 'Google',
  scopes: ['openid', 'email', 'profile'],
  credentials: (config) => [
    { env: 'GOOGLE_CLIENT_ID', value: config.oauth.google.clientId },
    { env: 'GOOGLE_CLIENT_SECRET', value: config.oauth.google.clientSecret },
  ],
  endpoints: () => ({
    authorizationURL: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenURL: 'https://oauth2.googleapis.com/token',
    userProfileURL: 'https://www.googleapis.com/oauth2/v3/userinfo',
  }),
  createStrategy: ({ endpoints, ...options }) =>
    new GoogleStrategy(
      {
        ...options,
        ...endpoints,
        scope: google.scopes,
        state: true,
      },
      (_accessToken: string, _refreshToken: string, profile: GoogleProfile, done: VerifyCallback) =>
        done(null, fromGoogleProfile(profile)),
    ),
};

const microsoft: OAuthProviderDefinition = {
  name: 'microsoft',
  displayName: 'Microsoft',
  scopes: ['openid', 'email', 'profile', 'User.Read'],
  credentials: (config) => [
    { env: 'MICROSOFT_CLIENT_ID', value: config.oauth.microsoft.clientId },
    { env: 'MICROSOFT_CLIENT_SECRET', value: config.oauth.microsoft.clientSecret },
    { env: 'MICROSOFT_TENANT', value: config.oauth.microsoft.tenant },
  ],
  endpoints: (config) => {
    const base = `https://login.microsoftonline.com/${encodeURIComponent(config.oauth.microsoft.tenant)}/oauth2/v2.0`;
    return {
      authorizationURL: `${base}/authorize`,
      tokenURL: `${base}/token`,
      userProfileURL: 'https://graph.microsoft.com/v1.0/me',
    };
  },
  createStrategy: (options) =>
    new ProviderOAuth2Strategy({
      ...options,
      provider: 'microsoft',
      scope: microsoft.scopes,
      readProfile: readMicrosoftProfile,
    }),
};

export const OAUTH_PROVIDERS: Readonly<Record<ProviderName, OAuthProviderDefinition>> = {
  github,
  google,
  microsoft,
};
