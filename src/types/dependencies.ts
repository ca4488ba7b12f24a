import type { Translator } from '../i18n/translator';
import type { PermissionFactory } from '../middleware/permission.middleware';
import type { RecordsStore } from '../records/records.types';
import type { TemplateRenderer } from '../templates/renderer';

export interface ItemTypeTemplates {
  register: string;
  property: string;
  mapping: string;
  error: string;
}

/** Collaborators shared by the item type, property and mapping routers. */
export interface RouteDependencies {
  records: RecordsStore;
  renderer: TemplateRenderer;
  translator: Translator;
  /** null leaves the guarded routes open. */
  permissionFactory: PermissionFactory | null;
  templates: ItemTypeTemplates;
}

export interface AppDependencies extends RouteDependencies {
  nodeEnv: string;
  accessSecret: string;
  defaultLocale: string;
  urlPrefix: string;
  corsOrigin: string;
  rateLimit: {
    windowMs: number;
    max: number;
  };
}
