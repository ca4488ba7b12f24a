import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';

const catalogSchema = z.record(z.string(), z.string());

export type Catalog = z.infer<typeof catalogSchema>;

export class Translator {
  constructor(private readonly catalogs: Record<string, Catalog>) {}

  /** Looks up `key` for the locale, then for its language (ja_JP -> ja); unknown keys come back unchanged. */
  t(locale: string, key: string): string {
    const language = locale.split(/[_-]/)[0];
    return this.catalogs[locale]?.[key] ?? this.catalogs[language]?.[key] ?? key;
  }

  bind(locale: string): (key: string) => string {
    return (key) => this.t(locale, key);
  }
}

/** Builds a translator from every `<locale>.json` file in `dir`. */
export async function loadTranslator(dir: string): Promise<Translator> {
  const files = (await fs.readdir(dir)).filter((file) => file.endsWith('.json'));
  const catalogs: Record<string, Catalog> = {};

  for (const file of files) {
    const raw = await fs.readFile(path.join(dir, file), 'utf8');
    catalogs[path.basename(file, '.json')] = catalogSchema.parse(JSON.parse(raw));
  }

  return new Translator(catalogs);
}
