/**
 * @file i18n.ts
 * @description Internationalisation FR/EN pour wgfleet
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

type Messages = Record<string, string>;

export type Lang = 'fr' | 'en';

const SUPPORTED: readonly Lang[] = ['fr', 'en'];

// src/ et dist/ sont tous deux à un niveau de la racine du paquet
const moduleDir = dirname(fileURLToPath(import.meta.url));

let currentLang: Lang = 'fr';
let messages: Messages = {};
let fallback: Messages = {};

function isLang(value: string | undefined): value is Lang {
  return SUPPORTED.some((lang) => lang === value);
}

function localeDirs(): string[] {
  const dirs = [
    process.env.WGFLEET_LOCALES_DIR,
    '/usr/lib/wgfleet/locales',
    join(moduleDir, '..', 'locales'),
    join(process.cwd(), 'locales'),
  ];
  return dirs.filter((dir): dir is string => typeof dir === 'string' && dir.length > 0);
}

function loadMessages(lang: Lang): Messages {
  for (const dir of localeDirs()) {
    const localePath = join(dir, `${lang}.json`);
    if (!existsSync(localePath)) continue;
    try {
      const parsed: unknown = JSON.parse(readFileSync(localePath, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null) {
        const result: Messages = {};
        for (const [key, value] of Object.entries(parsed)) {
          if (typeof value === 'string') result[key] = value;
        }
        return result;
      }
    } catch {
      // Fichier illisible : on essaie le répertoire suivant
      continue;
    }
  }
  return {};
}

/**
 * Initialise l'i18n
 * Priorité: paramètre > WGFLEET_LANG > fr
 */
export function initI18n(lang?: string): void {
  const requested = lang ?? process.env.WGFLEET_LANG;
  currentLang = isLang(requested) ? requested : 'fr';
  fallback = loadMessages('fr');
  messages = currentLang === 'fr' ? fallback : loadMessages(currentLang);
}

/**
 * Récupère un message traduit, `{param}` remplacé par sa valeur
 */
export function t(key: string, params?: Record<string, string | number>): string {
  let message = messages[key] ?? fallback[key] ?? key;

  if (params) {
    for (const [k, v] of Object.entries(params)) {
      message = message.replace(new RegExp(`\\{${k}\\}`, 'g'), () => String(v));
    }
  }

  return message;
}

export function getLang(): Lang {
  return currentLang;
}

initI18n();
