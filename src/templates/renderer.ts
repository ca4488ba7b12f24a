import path from 'path';
import ejs from 'ejs';
import type { Request } from 'express';
import type { Translator } from '../i18n/translator';

export type TemplateContext = Record<string, unknown>;

export interface TemplateRenderer {
  render(template: string, context: TemplateContext): Promise<string>;
}

export class EjsTemplateRenderer implements TemplateRenderer {
  constructor(private readonly root: string) {}

  render(template: string, context: TemplateContext): Promise<string> {
    return ejs.renderFile(path.join(this.root, template), context);
  }
}

/** Adds the request locale and a bound `t` to a page context. */
export function pageContext(req: Request, translator: Translator, context: TemplateContext): TemplateContext {
  return {
    ...context,
    locale: req.locale,
    t: translator.bind(req.locale),
  };
}
