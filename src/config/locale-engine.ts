import { I18n } from '@grammyjs/i18n';

import { resolvePath } from '../helpers/resolve-path.js';

// Two levels up from both src/config and dist/config.
export const LOCALES_PATH = resolvePath(import.meta.url, '../../locales');

export function initLocaleEngine(directory: string = LOCALES_PATH): I18n {
  return new I18n({
    directory,
    defaultLanguage: 'en',
    defaultLanguageOnMissing: true,
    useSession: true,
  });
}
