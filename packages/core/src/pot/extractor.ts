import type {
  InstallerConfig,
  WelcomePage,
  DesktopEntry,
  ChoiceEntry,
  OptionEntry,
} from '../config/schema.js';
import type { AdvisorySink } from '../types.js';

export const consoleAdvisorySink: AdvisorySink = (message) => {
  console.log(message);
};

/**
 * A key holding null counts as missing
 */
export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Text written for a field value. Scalars use their string form,
 * anything else its JSON form.
 */
export function toPotText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value) ?? String(value);
}

function describeEntry(entry: unknown): string {
  return JSON.stringify(entry) ?? String(entry);
}

/**
 * Destination of extracted strings, PotWriter satisfies it
 */
export interface EntryTarget {
  writeEntry(text: string): void;
}

/**
 * ConfigStringExtractor - Walks a config and emits its translatable strings
 *
 * Order: welcome text, desktops, additional software, additional features.
 * Entries missing a name are reported to the advisory sink and skipped,
 * the rest of the entry is still processed.
 */
export class ConfigStringExtractor {
  private target: EntryTarget;
  private advise: AdvisorySink;

  constructor(target: EntryTarget, advise: AdvisorySink = consoleAdvisorySink) {
    this.target = target;
    this.advise = advise;
  }

  handleConfig(config: InstallerConfig): void {
    if (config.welcome_page) {
      this.handleWelcome(config.welcome_page);
    }

    if (config.desktop) {
      this.handleDesktops(config.desktop);
    }

    if (config.additional_software) {
      this.handleChoices(config.additional_software);
    }

    if (config.additional_features) {
      this.handleChoices(config.additional_features);
    }
  }

  handleWelcome(welcomePage: WelcomePage): void {
    if (isPresent(welcomePage.text)) {
      this.emit(welcomePage.text);
    }
  }

  handleDesktops(desktops: DesktopEntry[]): void {
    for (const desktop of desktops) {
      if (isPresent(desktop.name)) {
        this.emit(desktop.name);
      } else {
        this.advise(`Invalid desktop: ${describeEntry(desktop)}`);
      }

      if (isPresent(desktop.description)) {
        this.emit(desktop.description);
      }
    }
  }

  handleChoices(choices: ChoiceEntry[]): void {
    for (const choice of choices) {
      if (isPresent(choice.name)) {
        this.emit(choice.name);
      } else {
        this.advise(`Invalid choice: ${describeEntry(choice)}`);
      }

      if (isPresent(choice.description)) {
        this.emit(choice.description);
      }

      if (choice.options) {
        this.handleOptions(choice.options);
      }
    }
  }

  private handleOptions(options: OptionEntry[]): void {
    for (const option of options) {
      if (isPresent(option.name)) {
        this.emit(option.name);
      } else if (!isPresent(option.option)) {
        // TODO: nothing reads `option`; confirm with the config schema owners whether
        // an option with only that key should be reported as invalid too
        this.advise(`Invalid option: ${describeEntry(option)}`);
      }
    }
  }

  private emit(value: unknown): void {
    this.target.writeEntry(toPotText(value));
  }
}

/**
 * Collect the translatable strings of a config, in template order
 *
 * @example
 * ```typescript
 * extractStrings({ desktop: [{ name: 'GNOME', description: 'A desktop' }] });
 * // ['GNOME', 'A desktop']
 * ```
 */
export function extractStrings(
  config: InstallerConfig,
  advise: AdvisorySink = consoleAdvisorySink
): string[] {
  const entries: string[] = [];
  const extractor = new ConfigStringExtractor({ writeEntry: (text) => entries.push(text) }, advise);

  extractor.handleConfig(config);

  return entries;
}
