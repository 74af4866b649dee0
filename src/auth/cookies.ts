import type { CookieOptions, Request, Response } from 'express';

export const REFRESH_TOKEN_COOKIE = 'refresh_token';

const refreshCookieOptions: CookieOptions = {
  httpOnly: true,
  secure: true,
  sameSite: 'lax',
  path: '/',
};

export function setRefreshTokenCookie(res: Response, token: string, maxAgeMs: number) {
  res.cookie(REFRESH_TOKEN_COOKIE, token, { ...refreshCookieOptions, maxAge: maxAgeMs });
}

export function clearRefreshTokenCookie(res: Response) {
  res.clearCookie(REFRESH_TOKEN_COOKIE, refreshCookieOptions);
}

export function readCookie(req: Request, name: string): string | undefined {
  const cookies: unknown = req.cookies;
  if (cookies === null || typeof cookies !== 'object') return undefined;
  const value: unknown = Object.getOwnPropertyDescriptor(cookies, name)?.value;
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
