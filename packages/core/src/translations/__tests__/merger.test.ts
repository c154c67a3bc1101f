import { describe, it, expect } from 'vitest';
import gettextParser from 'gettext-parser';
import {
  parseCatalog,
  mergeCatalog,
  countTranslations,
  compileCatalog,
  compileBinaryCatalog,
  templateOrder,
} from '../merger.js';
import { DE_PO } from './fixtures.js';

const POT_DATE = '2023-08-18 03:39+0100';

describe('Catalog merger', () => {
  describe('parseCatalog', () => {
    it('should parse translations and flags', () => {
      const catalog = parseCatalog(DE_PO, 'de.po');

      expect(catalog.translations[''].Welcome.msgstr).toEqual(['Willkommen']);
      expect(catalog.translations[''].GNOME.comments?.flag).toBe('fuzzy');
    });
  });

  describe('mergeCatalog', () => {
    it('should follow template order and keep existing translations', () => {
      const merged = mergeCatalog(parseCatalog(DE_PO, 'de.po'), ['Welcome', 'GNOME', 'New'], POT_DATE);

      expect(Object.keys(merged.translations[''])).toEqual(['', 'Welcome', 'GNOME', 'New']);
      expect(merged.translations[''].Welcome.msgstr).toEqual(['Willkommen']);
      expect(merged.translations[''].New.msgstr).toEqual(['']);
    });

    it('should drop messages missing from the template', () => {
      const merged = mergeCatalog(parseCatalog(DE_PO, 'de.po'), ['Welcome'], POT_DATE);

      expect(merged.translations[''].Obsolete).toBeUndefined();
    });

    it('should keep a repeated template message once', () => {
      const merged = mergeCatalog(parseCatalog(DE_PO, 'de.po'), ['Same', 'Same'], POT_DATE);

      expect(Object.keys(merged.translations[''])).toEqual(['', 'Same']);
    });

    it('should keep msgids that match Object.prototype members', () => {
      const merged = mergeCatalog(
        parseCatalog(DE_PO, 'de.po'),
        ['Welcome', 'constructor', 'valueOf'],
        POT_DATE
      );

      expect(Object.keys(merged.translations[''])).toEqual(['', 'Welcome', 'constructor', 'valueOf']);
      for (const msgid of ['constructor', 'valueOf']) {
        expect(merged.translations[''][msgid].msgstr).toEqual(['']);
      }
    });

    it('should take the creation date from the template', () => {
      const merged = mergeCatalog(parseCatalog(DE_PO, 'de.po'), [], POT_DATE);

      expect(merged.headers['POT-Creation-Date']).toBe(POT_DATE);
      expect(merged.headers.Language).toBe('de');
    });

    it('should survive a round trip through .po text', () => {
      const merged = mergeCatalog(parseCatalog(DE_PO, 'de.po'), ['Welcome', 'New'], POT_DATE);

      const reparsed = parseCatalog(compileCatalog(merged), 'de.po');

      expect(reparsed.translations[''].Welcome.msgstr).toEqual(['Willkommen']);
      expect(reparsed.translations[''].New.msgstr).toEqual(['']);
      expect(reparsed.translations[''].Obsolete).toBeUndefined();
    });
  });

  describe('compileCatalog', () => {
    it('should write numeric msgids in template order', () => {
      const msgids = ['Welcome', '2024'];
      const merged = mergeCatalog(parseCatalog(DE_PO, 'de.po'), msgids, POT_DATE);

      const text = compileCatalog(merged, msgids).toString('utf-8');

      expect(text.indexOf('msgid "Welcome"')).toBeGreaterThan(-1);
      expect(text.indexOf('msgid "2024"')).toBeGreaterThan(text.indexOf('msgid "Welcome"'));
    });

    it('should write msgids named after Object.prototype members', () => {
      const msgids = ['valueOf'];
      const merged = mergeCatalog(parseCatalog(DE_PO, 'de.po'), msgids, POT_DATE);

      const text = compileCatalog(merged, msgids).toString('utf-8');

      expect(text).toContain('msgid "valueOf"\nmsgstr ""');
    });
  });

  describe('templateOrder', () => {
    it('should sort the header first and messages by first template position', () => {
      const compare = templateOrder(['B', 'A', 'B']);
      const entries = [
        { msgid: 'A', msgstr: [''] },
        { msgid: 'Unknown', msgstr: [''] },
        { msgid: 'B', msgstr: [''] },
        { msgid: '', msgstr: [''] },
      ];

      expect(entries.sort(compare).map((entry) => entry.msgid)).toEqual(['', 'B', 'A', 'Unknown']);
    });
  });

  describe('countTranslations', () => {
    it('should count fuzzy messages as untranslated', () => {
      const merged = mergeCatalog(parseCatalog(DE_PO, 'de.po'), ['Welcome', 'GNOME', 'New'], POT_DATE);

      expect(countTranslations(merged)).toEqual({ translated: 1, untranslated: 2 });
    });
  });

  describe('compileBinaryCatalog', () => {
    it('should only include translated messages', () => {
      const merged = mergeCatalog(parseCatalog(DE_PO, 'de.po'), ['Welcome', 'GNOME', 'New'], POT_DATE);

      const binary = gettextParser.mo.parse(compileBinaryCatalog(merged));

      expect(binary.translations[''].Welcome.msgstr).toEqual(['Willkommen']);
      expect(binary.translations[''].GNOME).toBeUndefined();
      expect(binary.translations[''].New).toBeUndefined();
    });
  });
});
