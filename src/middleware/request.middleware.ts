import { Request, Response, NextFunction } from 'express';
import type { Translator } from '../i18n/translator';
import { logger } from '../utils/logger';

/**
 * Write endpoints only accept `Content-Type: application/json`, compared
 * exactly. Anything else is answered with 200 `{ msg: "Header Error" }`
 * before the handler runs.
 */
export const requireJsonContentType = (translator: Translator) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const contentType = req.headers['content-type'];

    if (contentType !== 'application/json') {
      logger.debug({ contentType, path: req.path }, 'Rejected write request content type');
      res.json({ msg: translator.t(req.locale, 'Header Error') });
      return;
    }

    next();
  };
};

/** Skips the route unless every named path segment is a non-negative integer. */
export const numericParams = (...names: string[]) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!names.every((name) => /^\d+$/.test(req.params[name] ?? ''))) {
      return next('route');
    }
    next();
  };
};
