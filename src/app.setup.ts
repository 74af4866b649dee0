import { ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import cookieParser from 'cookie-parser';
import cookieSession from 'cookie-session';
import { APP_CONFIG, type AppConfig } from './config/configuration';
import { OAUTH_STATE_COOKIE, OAUTH_STATE_TTL_MS } from './oauth/oauth.controller';

export const API_PREFIX = 'api/v1';

/**
 * HTTP wiring shared by main.ts and the HTTP tests.
 */
export function configureApp(app: NestExpressApplication) {
  const config = app.get<AppConfig>(APP_CONFIG);

  if (config.trustProxy) {
    app.set('trust proxy', 1);
  }

  app.setGlobalPrefix(API_PREFIX);
  app.use(cookieParser());
  // passport-oauth2 keeps the authorization state in the session between login and callback
  app.use(
    [`/${API_PREFIX}/login`, `/${API_PREFIX}/callback`],
    cookieSession({
      name: OAUTH_STATE_COOKIE,
      keys: [config.auth.secretKey],
      maxAge: OAUTH_STATE_TTL_MS,
      httpOnly: true,
      sameSite: 'lax',
      secure: config.environment !== 'local',
    }),
  );
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );
  app.enableCors({
    origin: config.corsOrigins.includes('*') ? true : config.corsOrigins,
    credentials: true,
  });
}
