import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { selectLocale } from '../src/i18n/locale';
import { loadTranslator, Translator } from '../src/i18n/translator';
import { buildTestApp, LOCALES_DIR } from './helpers/app';

describe('selectLocale', () => {
  it('falls back without an Accept-Language header', () => {
    expect(selectLocale(undefined, 'en')).toBe('en');
    expect(selectLocale('  ', 'ja')).toBe('ja');
  });

  it('prefers an exact match', () => {
    expect(selectLocale('ja', 'en')).toBe('ja');
    expect(selectLocale('ja-JP,ja;q=0.9', 'en')).toBe('ja_JP');
  });

  it('matches a regional tag to its language', () => {
    expect(selectLocale('en-US,en;q=0.8', 'ja')).toBe('en');
  });

  it('skips unsupported languages', () => {
    expect(selectLocale('fr-FR', 'en')).toBe('en');
    expect(selectLocale('fr, en;q=0.5', 'ja')).toBe('en');
  });
});

describe('Translator', () => {
  const translator = new Translator({
    en: { Success: 'Success' },
    ja: { Success: '成功しました', Fail: '失敗しました' },
  });

  it('translates for the locale', () => {
    expect(translator.t('ja', 'Success')).toBe('成功しました');
  });

  it('falls back from a regional locale to its language', () => {
    expect(translator.t('ja_JP', 'Fail')).toBe('失敗しました');
  });

  it('returns unknown keys unchanged', () => {
    expect(translator.t('en', 'Fail')).toBe('Fail');
    expect(translator.t('fr', 'Success')).toBe('Success');
  });

  it('binds a locale', () => {
    const t = translator.bind('ja');

    expect(t('Success')).toBe('成功しました');
  });

  it('loads every catalog from the locales directory', async () => {
    const loaded = await loadTranslator(LOCALES_DIR);

    expect(loaded.t('ja', 'Header Error')).toBe('ヘッダーエラー');
    expect(loaded.t('en', 'Header Error')).toBe('Header Error');
  });
});

describe('Response messages', () => {
  it('translates Header Error for a Japanese client', async () => {
    const { app } = await buildTestApp();

    const res = await request(app)
      .post('/itemtypes/register')
      .set('Content-Type', 'text/plain')
      .set('Accept-Language', 'ja-JP,ja;q=0.9')
      .send('{}');

    expect(res.body).toEqual({ msg: 'ヘッダーエラー' });
  });

  it('translates Fail for a Japanese client', async () => {
    const { app } = await buildTestApp();

    const res = await request(app)
      .post('/itemtypes/mapping')
      .set('Content-Type', 'application/json')
      .set('Accept-Language', 'ja')
      .send({ item_type_id: 1, mapping: 'not json' });

    expect(res.body).toEqual({ msg: '失敗しました' });
  });
});
