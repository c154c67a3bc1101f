export const POT_CREATION_DATE = '2023-08-18 03:39+0100';

/**
 * Fixed header of the generated template. Placeholders are left for the
 * translation tools to fill in.
 */
const POT_HEADER_LINES = [
  '# SOME DESCRIPTIVE TITLE.',
  "# Copyright (C) YEAR THE PACKAGE'S COPYRIGHT HOLDER",
  '# This file is distributed under the same license as the os-installer package.',
  '# FIRST AUTHOR <EMAIL@ADDRESS>, YEAR.',
  '#',
  'msgid ""',
  'msgstr ""',
  '"Project-Id-Version: os-installer-config\\n"',
  '"Report-Msgid-Bugs-To: \\n"',
  `"POT-Creation-Date: ${POT_CREATION_DATE}\\n"`,
  '"PO-Revision-Date: YEAR-MO-DA HO:MI+ZONE\\n"',
  '"Last-Translator: FULL NAME <EMAIL@ADDRESS>\\n"',
  '"Language-Team: LANGUAGE <LL@li.org>\\n"',
  '"Language: \\n"',
  '"MIME-Version: 1.0\\n"',
  '"Content-Type: text/plain; charset=UTF-8\\n"',
  '"Content-Transfer-Encoding: 8bit\\n"',
];

export const POT_HEADER = `${POT_HEADER_LINES.join('\n')}\n\n`;

/**
 * Format one template entry.
 *
 * The text is written verbatim: a double quote or a newline inside it
 * produces an entry gettext tools will reject.
 */
export function formatPotEntry(text: string): string {
  return `msgid "${text}"\nmsgstr ""\n\n`;
}

/**
 * PotWriter - Builds the content of a .pot template
 */
export class PotWriter {
  private chunks: string[] = [];
  private entries: string[] = [];
  private headerWritten = false;

  /**
   * Write the fixed header block
   *
   * @throws Error if called twice or after an entry
   */
  writeHeader(): void {
    if (this.headerWritten || this.entries.length > 0) {
      throw new Error('Template header must be written once, before any entry');
    }

    this.chunks.push(POT_HEADER);
    this.headerWritten = true;
  }

  writeEntry(text: string): void {
    this.chunks.push(formatPotEntry(text));
    this.entries.push(text);
  }

  /**
   * Entries written so far, in order
   */
  getEntries(): string[] {
    return [...this.entries];
  }

  toString(): string {
    return this.chunks.join('');
  }
}
