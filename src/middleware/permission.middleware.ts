import { Request, Response, NextFunction } from 'express';
import { ForbiddenError, NotFoundError, UnauthorizedError } from '../utils/errors';

export interface Permission {
  can(): boolean;
}

export type PermissionFactory = (req: Request) => Permission;

export interface PermissionOptions {
  /**
   * Answer 404 instead of 401/403 on rejection, hiding whether the object
   * exists at all.
   */
  hidden?: boolean;
}

/**
 * Throws the matching HTTP error when the permission is rejected. A null
 * factory means the route is open.
 */
export function checkPermission(req: Request, factory: PermissionFactory | null, { hidden = false }: PermissionOptions = {}) {
  if (factory === null || factory(req).can()) {
    return;
  }

  if (hidden) {
    throw new NotFoundError();
  }
  if (req.user) {
    throw new ForbiddenError('You do not have a permission for itemtype');
  }
  throw new UnauthorizedError();
}

export const needPermissions = (factory: PermissionFactory | null, options: PermissionOptions = {}) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      checkPermission(req, factory, options);
      next();
    } catch (error) {
      next(error);
    }
  };
};

/** Grants access to authenticated users holding one of `roles`. */
export const rolePermissionFactory = (roles: readonly string[]): PermissionFactory => {
  return (req) => ({
    can: () => req.user !== undefined && roles.includes(req.user.role),
  });
};
