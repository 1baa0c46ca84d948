import path from 'node:path';
import i18n from 'i18next';
import Backend from 'i18next-fs-backend';

import { log } from './log';

export type Lang = 'en' | 'tr';

const SUPPORTED: readonly Lang[] = ['en', 'tr'];

// Create and configure i18n instance
const i18nInstance = i18n.createInstance();

// initImmediate: false makes the fs backend read the files synchronously,
// so translations are ready once this module has loaded
i18nInstance
  .use(Backend)
  .init({
    initImmediate: false,
    fallbackLng: 'en',
    supportedLngs: [...SUPPORTED],
    preload: [...SUPPORTED],
    ns: ['common'],
    defaultNS: 'common',
    backend: { loadPath: path.resolve(process.cwd(), 'locales/{{lng}}/{{ns}}.json') },
    interpolation: {
      escapeValue: false // replies are sent as plain text
    }
  })
  .catch(err => log.error({ err }, 'Failed to load translations'));

/** Pick a reply language from a Telegram `language_code`. */
export function langFrom(code?: string): Lang {
  const short = code?.slice(0, 2).toLowerCase();
  return SUPPORTED.find(l => l === short) ?? 'en';
}

export function t(lng: Lang, key: string, params: Record<string, string | number> = {}): string {
  return i18nInstance.t(key, { lng, replace: params });
}

export default i18nInstance;
