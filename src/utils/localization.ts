import { TranslationKey, type AgendaLocalizations } from '../types';
import { getLanguageCode } from './dateFormat';

/**
 * Built-in translations keyed by language code
 */
const TRANSLATIONS: Record<string, AgendaLocalizations> = {
  en: {
    [TranslationKey.noSelectedDate]: 'No selected date',
    [TranslationKey.noEvents]: 'No events',
    [TranslationKey.daySpanCount]: 'Day',
  },
  vi: {
    [TranslationKey.noSelectedDate]: 'Không có ngày được chọn',
    [TranslationKey.noEvents]: 'Không có sự kiện',
    [TranslationKey.daySpanCount]: 'Ngày',
  },
};

/**
 * Language codes with built-in translations
 */
export const SUPPORTED_LANGUAGES: readonly string[] = Object.keys(TRANSLATIONS);

/**
 * Contract check: throws outside production, warns in production
 */
export function devAssert(condition: boolean, message: string): void {
  if (condition) return;
  if (process.env.NODE_ENV !== 'production') {
    throw new Error(message);
  }
  console.warn(message);
}

function isComplete(overrides: Partial<AgendaLocalizations>): overrides is AgendaLocalizations {
  return Object.values(TranslationKey).every(key => typeof overrides[key] === 'string');
}

/**
 * Resolve the strings for a locale, with caller overrides on top.
 * A locale without built-in translations must come with a complete override table;
 * otherwise it is a contract violation and English is used in production.
 */
export function resolveLocalizations(
  locale: string,
  overrides: Partial<AgendaLocalizations> = {}
): AgendaLocalizations {
  const builtIn = TRANSLATIONS[getLanguageCode(locale)];
  if (builtIn) {
    return { ...builtIn, ...overrides };
  }

  if (isComplete(overrides)) {
    return { ...overrides };
  }

  devAssert(false, `No agenda translations for unsupported locale "${locale}"`);
  return { ...TRANSLATIONS.en, ...overrides };
}
