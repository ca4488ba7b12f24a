// Fix Express v5 string | string[] params typing, and add what our middleware attaches
import 'express-serve-static-core';
import type { AuthUser } from '../middleware/auth.middleware';

declare module 'express-serve-static-core' {
  interface ParamsDictionary {
    [key: string]: string;
  }

  interface Request {
    /** Set by localeMiddleware. */
    locale: string;
    /** Set by optionalAuth when a valid access token is presented. */
    user?: AuthUser;
  }
}
