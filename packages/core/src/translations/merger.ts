import gettextParser from 'gettext-parser';
import type { GetTextTranslation, GetTextTranslations } from 'gettext-parser';

/**
 * Custom error for catalogs that cannot be parsed or merged
 */
export class CatalogMergeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogMergeError';
  }
}

/**
 * Parse a .po catalog
 *
 * @param content - Raw catalog content
 * @param poPath - Path used in error messages
 * @throws CatalogMergeError if the catalog is malformed
 */
export function parseCatalog(content: Buffer | string, poPath: string): GetTextTranslations {
  try {
    return gettextParser.po.parse(content);
  } catch (error) {
    throw new CatalogMergeError(
      `Failed to parse catalog ${poPath}: ${error instanceof Error ? error.message : 'Unknown'}`,
      { cause: error }
    );
  }
}

/**
 * Merge template msgids into an existing catalog
 *
 * Every template msgid is kept, in template order, with its existing
 * translation if the catalog has one. Msgids missing from the template are
 * dropped. The catalog headers are kept, except POT-Creation-Date, which
 * follows the template.
 *
 * @param catalog - Parsed existing catalog
 * @param msgids - Template entries in template order (duplicates allowed)
 * @param potCreationDate - POT-Creation-Date of the template
 */
export function mergeCatalog(
  catalog: GetTextTranslations,
  msgids: string[],
  potCreationDate: string
): GetTextTranslations {
  const existing = catalog.translations[''] ?? {};
  // No prototype, so msgids like "constructor" are plain keys
  const merged: Record<string, GetTextTranslation> = Object.create(null);
  merged[''] = Object.hasOwn(existing, '') ? existing[''] : { msgid: '', msgstr: [''] };

  for (const msgid of msgids) {
    // '' is the header entry
    if (msgid === '' || Object.hasOwn(merged, msgid)) continue;

    merged[msgid] = Object.hasOwn(existing, msgid) ? existing[msgid] : { msgid, msgstr: [''] };
  }

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(catalog.headers)) {
    if (key.toLowerCase() !== 'pot-creation-date') headers[key] = value;
  }
  headers['POT-Creation-Date'] = potCreationDate;

  return {
    charset: catalog.charset || 'utf-8',
    headers,
    translations: { '': merged },
  };
}

function isTranslated(entry: GetTextTranslation): boolean {
  const fuzzy = entry.comments?.flag?.includes('fuzzy') ?? false;
  return !fuzzy && entry.msgstr.some((value) => value !== '');
}

/**
 * Count translated and untranslated messages, header excluded.
 * Fuzzy messages count as untranslated.
 */
export function countTranslations(catalog: GetTextTranslations): {
  translated: number;
  untranslated: number;
} {
  let translated = 0;
  let untranslated = 0;

  for (const [msgctxt, entries] of Object.entries(catalog.translations)) {
    for (const [msgid, entry] of Object.entries(entries)) {
      if (msgctxt === '' && msgid === '') continue;

      if (isTranslated(entry)) {
        translated++;
      } else {
        untranslated++;
      }
    }
  }

  return { translated, untranslated };
}

/**
 * Comparator putting messages in template order, header first.
 * Object keys alone cannot carry that order: integer-like msgids such as
 * "2024" always iterate first.
 */
export function templateOrder(
  msgids: string[]
): (left: GetTextTranslation, right: GetTextTranslation) => number {
  const positions = new Map<string, number>();
  msgids.forEach((msgid, index) => {
    if (!positions.has(msgid)) positions.set(msgid, index);
  });

  const rank = (entry: GetTextTranslation): number => {
    if (entry.msgid === '') return -1;
    return positions.get(entry.msgid) ?? Number.MAX_SAFE_INTEGER;
  };

  return (left, right) => rank(left) - rank(right);
}

/**
 * Render a catalog as .po text
 *
 * @param msgids - Template entries; when given, messages are written in their order
 */
export function compileCatalog(catalog: GetTextTranslations, msgids?: string[]): Buffer {
  return gettextParser.po.compile(catalog, msgids ? { sort: templateOrder(msgids) } : undefined);
}

/**
 * Render a catalog as a binary .mo file.
 * Untranslated and fuzzy messages are left out, the header is kept.
 */
export function compileBinaryCatalog(catalog: GetTextTranslations): Buffer {
  const translations: Record<string, Record<string, GetTextTranslation>> = {};

  for (const [msgctxt, entries] of Object.entries(catalog.translations)) {
    const kept: Record<string, GetTextTranslation> = Object.create(null);

    for (const [msgid, entry] of Object.entries(entries)) {
      if ((msgctxt === '' && msgid === '') || isTranslated(entry)) {
        kept[msgid] = entry;
      }
    }

    translations[msgctxt] = kept;
  }

  return gettextParser.mo.compile({ ...catalog, translations });
}
