import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import type { OAuthEndpoints } from '../oauth/oauth-providers';

export const FAKE_AUTHORIZATION_CODE = 'good-code';
export const FAKE_PROVIDER_TOKEN = 'provider-token';

export interface FakeProviderRoute {
  status: number;
  body: unknown;
}

/**
 * OAuth provider stand-in on 127.0.0.1. Exchanges FAKE_AUTHORIZATION_CODE for
 * FAKE_PROVIDER_TOKEN and answers GET requests from the `resources` table
 * when called with that token.
 */
export class FakeOAuthProvider {
  readonly requests: Array<{ method: string; path: string; body: string }> = [];
  readonly resources = new Map<string, FakeProviderRoute>();

  private constructor(
    private readonly server: Server,
    readonly baseUrl: string,
  ) {}

  static async start(): Promise<FakeOAuthProvider> {
    let provider: FakeOAuthProvider | undefined;
    const server = createServer((req, res) => {
      provider?.handle(req, res);
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    provider = new FakeOAuthProvider(server, `http://127.0.0.1:${port}`);
    return provider;
  }

  /** Endpoints under `/<prefix>`; the profile lives at `/<prefix>/userinfo`. */
  endpoints(prefix: string): OAuthEndpoints {
    return {
      authorizationURL: `${this.baseUrl}/${prefix}/authorize`,
      tokenURL: `${this.baseUrl}/${prefix}/token`,
      userProfileURL: `${this.baseUrl}/${prefix}/userinfo`,
    };
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private handle(req: IncomingMessage, res: ServerResponse) {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const body = Buffer.concat(chunks).toString('utf8');
      const path = (req.url ?? '/').split('?')[0];
      this.requests.push({ method: req.method ?? 'GET', path, body });

      if (req.method === 'POST' && path.endsWith('/token')) {
        const code = new URLSearchParams(body).get('code');
        if (code === FAKE_AUTHORIZATION_CODE) {
          this.reply(res, 200, { access_token: FAKE_PROVIDER_TOKEN, token_type: 'bearer' });
        } else {
          this.reply(res, 400, { error: 'invalid_grant', error_description: 'Bad verification code.' });
        }
        return;
      }

      if (req.headers.authorization !== `Bearer ${FAKE_PROVIDER_TOKEN}`) {
        this.reply(res, 401, { message: 'Requires authentication' });
        return;
      }

      const route = this.resources.get(path);
      if (route) {
        this.reply(res, route.status, route.body);
      } else {
        this.reply(res, 404, { message: 'Not Found' });
      }
    });
  }

  private reply(res: ServerResponse, status: number, body: unknown) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }
}
