import { InternalOAuthError, Strategy as OAuth2Strategy, type VerifyCallback } from 'passport-oauth2';
import type {
  FetchJson,
  OAuthEndpoints,
  OAuthProfile,
  ProfileReader,
  ProviderName,
} from '../oauth-providers';

export interface ProviderOAuth2StrategyOptions {
  provider: ProviderName;
  clientID: string;
  clientSecret: string;
  callbackURL: string;
  scope: string[];
  endpoints: OAuthEndpoints;
  readProfile: ProfileReader;
}

function passProfile(
  _accessToken: string,
  _refreshToken: string,
  profile: OAuthProfile,
  done: VerifyCallback,
) {
  done(null, profile);
}

/**
 * OAuth 2.0 authorization-code strategy for providers without an OpenID profile:
 * the user profile comes from the provider API and is mapped by the provider's reader.
 * State is kept in the request session and checked on callback.
 */
export class ProviderOAuth2Strategy extends OAuth2Strategy {
  private readonly provider: ProviderName;
  private readonly userProfileURL: string;
  private readonly readProfile: ProfileReader;

  constructor(options: ProviderOAuth2StrategyOptions) {
    super(
      {
        authorizationURL: options.endpoints.authorizationURL,
        tokenURL: options.endpoints.tokenURL,
        clientID: options.clientID,
        clientSecret: options.clientSecret,
        callbackURL: options.callbackURL,
        scope: options.scope,
        state: true,
        customHeaders: { Accept: 'application/json' },
      },
      passProfile,
    );
    this.name = options.provider;
    this.provider = options.provider;
    this.userProfileURL = options.endpoints.userProfileURL;
    this.readProfile = options.readProfile;
    this._oauth2.useAuthorizationHeaderforGET(true);
  }

  userProfile(accessToken: string, done: (err?: Error | null, profile?: OAuthProfile) => void): void {
    this.loadProfile(accessToken)
      .then((profile) => done(null, profile))
      .catch((error: unknown) => {
        done(new InternalOAuthError('Failed to fetch user profile', error));
      });
  }

  private async loadProfile(accessToken: string): Promise<OAuthProfile> {
    const fetchJson: FetchJson = (url) =>
      new Promise((resolve, reject) => {
        this._oauth2.get(url, accessToken, (error: { statusCode: number } | null, body?: string | Buffer) => {
          if (error) {
            reject(new InternalOAuthError(`Failed to fetch ${url}`, error));
            return;
          }
          try {
            const json: unknown = JSON.parse(String(body));
            resolve(json);
          } catch (parseError) {
            reject(parseError);
          }
        });
      });

    const userInfo = await fetchJson(this.userProfileURL);
    const fields = await this.readProfile(userInfo, fetchJson, this.userProfileURL);
    return { provider: this.provider, ...fields };
  }
}
