import Negotiator from 'negotiator';
import type { Request, Response, NextFunction } from 'express';

// Ordered by preference; `tag` is the HTTP language tag negotiated against.
const SUPPORTED_LOCALES = [
  { locale: 'ja', tag: 'ja' },
  { locale: 'ja_JP', tag: 'ja-JP' },
  { locale: 'en', tag: 'en' },
] as const;

/**
 * Picks the best supported locale for an Accept-Language header value.
 * Falls back to `fallback` when the header is absent or nothing matches.
 */
export function selectLocale(acceptLanguage: string | undefined, fallback: string): string {
  if (!acceptLanguage || acceptLanguage.trim() === '') {
    return fallback;
  }

  const negotiator = new Negotiator({ headers: { 'accept-language': acceptLanguage } });
  const tag = negotiator.language(SUPPORTED_LOCALES.map((entry) => entry.tag));

  return SUPPORTED_LOCALES.find((entry) => entry.tag === tag)?.locale ?? fallback;
}

export const localeMiddleware = (fallback: string) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.locale = selectLocale(req.headers['accept-language'], fallback);
    next();
  };
};
