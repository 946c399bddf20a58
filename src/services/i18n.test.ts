/**
 * Property-based tests for i18n System
 */

import { describe, it, expect, beforeEach } from 'vitest';
import fc from 'fast-check';
import * as path from 'path';
import { I18nSystem, I18nError, isTranslationFile, type TranslationFile } from './i18n.js';
import { createLogger, type LogEntry } from '../core/logger.js';
import { MESSAGE_KEYS } from '../commands/messages.js';

const localeArbitrary = fc.stringMatching(/^[a-z]{2}$/);

const keyPartArbitrary = fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9_]{0,9}$/);
const translationKeyArbitrary = fc.array(keyPartArbitrary, { minLength: 1, maxLength: 3 })
  .map(parts => parts.join('.'));

const translationValueArbitrary = fc.string({ minLength: 1, maxLength: 50 })
  .filter(s => !s.includes('{{'));

function createNestedTranslation(key: string, value: string): TranslationFile {
  const parts = key.split('.');
  const leaf = parts.pop() ?? key;
  let result: TranslationFile = { [leaf]: value };
  for (const part of parts.reverse()) {
    result = { [part]: result };
  }
  return result;
}

const LOCALES_PATH = path.resolve(process.cwd(), 'locales');

describe('i18n System Property Tests', () => {
  let i18n: I18nSystem;
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    i18n = new I18nSystem({
      defaultLocale: 'en',
      logger: createLogger('debug', (entry) => entries.push(entry)),
    });
  });

  describe('Translation Fallback', () => {
    it('should return the translation of the requested locale when it exists', () => {
      fc.assert(
        fc.property(
          localeArbitrary.filter(l => l !== 'en'),
          translationKeyArbitrary,
          translationValueArbitrary,
          (locale, key, value) => {
            i18n.clear();
            i18n.setTranslations(locale, createNestedTranslation(key, value));
            i18n.setTranslations('en', createNestedTranslation(key, `default_${value}`));

            expect(i18n.t(key, locale)).toBe(value);
          }
        ),
        { numRuns: 100 }
      );
    });

    it('should fall back to the default locale, then to the key itself', () => {
      fc.assert(
        fc.property(translationKeyArbitrary, translationValueArbitrary, (key, value) => {
          i18n.clear();
          i18n.setTranslations('en', createNestedTranslation(key, value));

          expect(i18n.t(key, 'xx')).toBe(value);
          expect(i18n.t(`${key}.missing`, 'xx')).toBe(`${key}.missing`);
        }),
        { numRuns: 100 }
      );
    });

    it('should use the base language of a regional locale', () => {
      i18n.setTranslations('en', { greeting: 'Hello' });
      i18n.setTranslations('ru', { greeting: 'Привет' });

      expect(i18n.resolveLocale('ru-RU')).toBe('ru');
      expect(i18n.t('greeting', 'ru-RU')).toBe('Привет');
      expect(i18n.resolveLocale(undefined)).toBe('en');
    });

    it('should warn once per missing key and locale', () => {
      i18n.setTranslations('en', {});

      i18n.t('absent.key', 'en');
      i18n.t('absent.key', 'en');

      const warnings = entries.filter(e => e.level === 'warn');
      expect(warnings).toHaveLength(1);
      expect(warnings[0].context).toEqual({ key: 'absent.key', locale: 'en' });
    });
  });

  describe('Interpolation', () => {
    it('should replace known parameters and keep unknown ones', () => {
      i18n.setTranslations('en', { line: '{{id}} ({{state}})' });

      expect(i18n.t('line', 'en', { id: 'hub', state: 'enabled' })).toBe('hub (enabled)');
      expect(i18n.t('line', 'en', { id: 'hub' })).toBe('hub ({{state}})');
    });

    it('should return empty texts as they are', () => {
      i18n.setTranslations('en', { dispatch: { unsupported_sender: '' } });
      expect(i18n.t('dispatch.unsupported_sender')).toBe('');
    });
  });

  describe('Translation Files', () => {
    it('should accept nested string maps only', () => {
      expect(isTranslationFile({ a: 'x', b: { c: 'y' } })).toBe(true);
      expect(isTranslationFile({ a: 1 })).toBe(false);
      expect(isTranslationFile(['a'])).toBe(false);
      expect(() => i18n.setTranslations('en', JSON.parse('{"a": [1]}'))).toThrow(I18nError);
    });

    it('should load the shipped locales with every dispatch text', () => {
      i18n.loadTranslations(LOCALES_PATH);

      expect(i18n.getAvailableLocales().sort()).toEqual(['en', 'ru']);
      for (const locale of ['en', 'ru']) {
        for (const key of Object.values(MESSAGE_KEYS)) {
          expect(i18n.hasTranslation(key, locale)).toBe(true);
        }
      }
      expect(i18n.t(MESSAGE_KEYS.NO_PERMISSION, 'en')).toBe('Sorry, you do not have permission for this command.');
    });

    it('should fail for a missing locales directory', () => {
      expect(() => i18n.loadTranslations(path.join(LOCALES_PATH, 'nowhere'))).toThrow(I18nError);
    });

    it('should fail when no directory is configured', () => {
      expect(() => i18n.loadTranslations()).toThrow('No locales directory configured');
    });
  });
});
