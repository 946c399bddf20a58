/**
 * i18n System
 * Locale files for sender-visible texts, with lookup, interpolation and fallback
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '../core/logger.js';

export interface TranslationFile {
  [key: string]: string | TranslationFile;
}

export interface I18nOptions {
  defaultLocale: string;
  localesPath?: string;
  /** Receives one warning per missing key and locale */
  logger?: Logger;
}

export class I18nError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'I18nError';
  }
}

export function isTranslationFile(obj: unknown): obj is TranslationFile {
  if (typeof obj !== 'object' || obj === null || Array.isArray(obj)) {
    return false;
  }

  return Object.values(obj).every(
    value => typeof value === 'string' || isTranslationFile(value)
  );
}

export class I18nSystem {
  private translations: Map<string, TranslationFile> = new Map();
  private defaultLocale: string;
  private localesPath: string | undefined;
  private logger: Logger | undefined;
  private missingKeyWarnings: Set<string> = new Set();

  constructor(options: I18nOptions) {
    this.defaultLocale = options.defaultLocale;
    this.localesPath = options.localesPath;
    this.logger = options.logger;
  }

  /**
   * Loads every `<locale>.json` file of the locales directory
   */
  loadTranslations(localesPath?: string): void {
    const targetPath = localesPath ?? this.localesPath;
    if (targetPath === undefined) {
      throw new I18nError('No locales directory configured');
    }

    if (!fs.existsSync(targetPath)) {
      throw new I18nError(`Locales directory not found: ${targetPath}`);
    }

    const jsonFiles = fs.readdirSync(targetPath).filter(f => f.endsWith('.json'));
    if (jsonFiles.length === 0) {
      throw new I18nError(`No translation files found in: ${targetPath}`);
    }

    for (const file of jsonFiles) {
      const content = fs.readFileSync(path.join(targetPath, file), 'utf-8');

      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch {
        throw new I18nError(`Invalid JSON in translation file: ${file}`);
      }

      if (!isTranslationFile(parsed)) {
        throw new I18nError(`Invalid translation file format: ${file}`);
      }

      this.translations.set(path.basename(file, '.json'), parsed);
    }
  }

  private getNestedValue(obj: TranslationFile, key: string): string | undefined {
    let current: TranslationFile | string | undefined = obj;

    for (const part of key.split('.')) {
      if (typeof current !== 'object') {
        return undefined;
      }
      current = current[part];
    }

    return typeof current === 'string' ? current : undefined;
  }

  private interpolate(text: string, params?: Record<string, string>): string {
    if (!params) {
      return text;
    }

    return text.replace(/\{\{(\w+)\}\}/g, (match, key: string) => params[key] ?? match);
  }

  /**
   * Translate a key with optional locale and parameters
   * Fallback order: locale -> base language -> defaultLocale -> key
   */
  t(key: string, locale?: string, params?: Record<string, string>): string {
    const candidates = [this.resolveLocale(locale), this.defaultLocale];

    for (const candidate of candidates) {
      const translations = this.translations.get(candidate);
      const value = translations && this.getNestedValue(translations, key);
      if (value !== undefined) {
        return this.interpolate(value, params);
      }
    }

    const targetLocale = locale ?? this.defaultLocale;
    const warningKey = `${targetLocale}:${key}`;
    if (!this.missingKeyWarnings.has(warningKey)) {
      this.missingKeyWarnings.add(warningKey);
      this.logger?.warn('Missing translation key', { key, locale: targetLocale });
    }

    return key;
  }

  /**
   * Maps a requested locale (e.g. `en-US`) onto a loaded one, or the default
   */
  resolveLocale(requested?: string): string {
    if (requested && this.translations.has(requested)) {
      return requested;
    }

    if (requested && requested.includes('-')) {
      const baseLocale = requested.split('-')[0];
      if (this.translations.has(baseLocale)) {
        return baseLocale;
      }
    }

    return this.defaultLocale;
  }

  getAvailableLocales(): string[] {
    return Array.from(this.translations.keys());
  }

  hasTranslation(key: string, locale: string): boolean {
    const translations = this.translations.get(locale);
    return translations !== undefined && this.getNestedValue(translations, key) !== undefined;
  }

  getDefaultLocale(): string {
    return this.defaultLocale;
  }

  /**
   * Set translations directly (useful for testing)
   */
  setTranslations(locale: string, translations: TranslationFile): void {
    if (!isTranslationFile(translations)) {
      throw new I18nError('Invalid translation file format');
    }
    this.translations.set(locale, translations);
  }

  clear(): void {
    this.translations.clear();
    this.missingKeyWarnings.clear();
  }
}
