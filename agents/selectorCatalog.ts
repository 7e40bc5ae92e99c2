import { readFileSync } from 'node:fs';
import defaultCatalog from './agentSelectors.json';

export const SURFACES = [
  'composer',
  'interstitials',
  'newChat',
  'uploadMenu',
  'uploadItem',
  'fileInput',
  'attachmentChip',
  'sendButton',
  'answer',
] as const;

export type Surface = (typeof SURFACES)[number];

/** Ordered candidate selectors per UI surface; the first that matches wins. */
export type SelectorCatalog = Record<Surface, string[]>;

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === 'string');

/**
 * Validates a parsed catalog. Surfaces missing from `raw` keep the entries of `base`, so an
 * override file only needs the surfaces whose markup changed.
 */
export function parseSelectorCatalog(raw: unknown, base: SelectorCatalog): SelectorCatalog {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('El catálogo de selectores debe ser un objeto JSON');
  }
  const catalog: SelectorCatalog = { ...base };
  for (const [key, value] of Object.entries(raw)) {
    const surface = SURFACES.find((name) => name === key);
    if (!surface) {
      throw new Error(`Superficie desconocida en el catálogo de selectores: ${key}`);
    }
    if (!isStringList(value) || value.length === 0) {
      throw new Error(`La superficie ${key} debe ser una lista no vacía de selectores`);
    }
    catalog[surface] = value;
  }
  return catalog;
}

export const DEFAULT_SELECTORS: SelectorCatalog = parseSelectorCatalog(defaultCatalog, {
  composer: [],
  interstitials: [],
  newChat: [],
  uploadMenu: [],
  uploadItem: [],
  fileInput: [],
  attachmentChip: [],
  sendButton: [],
  answer: [],
});

export function loadSelectorCatalog(overridePath?: string): SelectorCatalog {
  if (!overridePath) {
    return DEFAULT_SELECTORS;
  }
  const raw: unknown = JSON.parse(readFileSync(overridePath, 'utf8'));
  return parseSelectorCatalog(raw, DEFAULT_SELECTORS);
}
