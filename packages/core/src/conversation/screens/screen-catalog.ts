import { DEFAULT_LANGUAGE, type Language } from "../../session/session.ts";
import catalogJson from "./screen-catalog.json";

export type ScreenParams = Readonly<Record<string, string | number>>;

type ScreenCatalog = ReadonlyMap<string, Readonly<Partial<Record<string, string>>>>;

const PLACEHOLDER_PATTERN = /\{([a-z0-9_]+)\}/g;

const SCREEN_CATALOG: ScreenCatalog = parseScreenCatalog(catalogJson);

export function hasScreen(key: string): boolean {
  return SCREEN_CATALOG.has(key);
}

/**
 * Renders a catalog entry in `language`, falling back to English when the entry has
 * no translation. Every `{placeholder}` must be supplied.
 */
export function renderScreen(key: string, language: Language, params: ScreenParams = {}): string {
  const entry = SCREEN_CATALOG.get(key);
  if (!entry) {
    throw new Error(`Unknown screen '${key}'.`);
  }
  const template = entry[language] ?? entry[DEFAULT_LANGUAGE];
  if (template === undefined) {
    throw new Error(`Screen '${key}' has no ${DEFAULT_LANGUAGE} text.`);
  }

  return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new Error(`Missing param '${name}' for screen '${key}'.`);
    }
    return String(value);
  });
}

export function parseScreenCatalog(raw: unknown): ScreenCatalog {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error("Screen catalog must be an object.");
  }

  const catalog = new Map<string, Partial<Record<string, string>>>();
  for (const [key, entry] of Object.entries(raw)) {
    if (!entry || typeof entry !== "object" || Array.isArray(entry)) {
      throw new Error(`Screen '${key}' must map languages to text.`);
    }
    const translations: Partial<Record<string, string>> = {};
    for (const [language, text] of Object.entries(entry)) {
      if (typeof text !== "string" || text.trim().length === 0) {
        throw new Error(`Screen '${key}' has empty '${language}' text.`);
      }
      translations[language] = text;
    }
    if (translations[DEFAULT_LANGUAGE] === undefined) {
      throw new Error(`Screen '${key}' has no ${DEFAULT_LANGUAGE} text.`);
    }
    catalog.set(key, translations);
  }
  return catalog;
}
