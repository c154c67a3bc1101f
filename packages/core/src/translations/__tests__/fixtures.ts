/**
 * Catalog fixtures shared by the translation tests
 */

export const DE_PO = [
  'msgid ""',
  'msgstr ""',
  '"Project-Id-Version: os-installer-config\\n"',
  '"POT-Creation-Date: 2020-01-01 00:00+0000\\n"',
  '"Language: de\\n"',
  '"MIME-Version: 1.0\\n"',
  '"Content-Type: text/plain; charset=UTF-8\\n"',
  '"Content-Transfer-Encoding: 8bit\\n"',
  '',
  'msgid "Welcome"',
  'msgstr "Willkommen"',
  '',
  '#, fuzzy',
  'msgid "GNOME"',
  'msgstr "GNOME-Desktop"',
  '',
  'msgid "Obsolete"',
  'msgstr "Veraltet"',
  '',
].join('\n');

export const FR_PO = [
  'msgid ""',
  'msgstr ""',
  '"Language: fr\\n"',
  '"Content-Type: text/plain; charset=UTF-8\\n"',
  '',
  'msgid "Welcome"',
  'msgstr "Bienvenue"',
  '',
].join('\n');

export const CONFIG_YAML = `
welcome_page:
  text: Welcome
desktop:
  - name: GNOME
`;
