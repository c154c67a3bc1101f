import { z } from 'zod';

/**
 * Zod schema for the translatable parts of an installer config.
 *
 * Only container shapes are checked. Text fields stay `unknown` and every
 * mapping keeps its other keys, the installer reads far more than we do.
 */

// Sub-option of a choice
const OptionSchema = z
  .object({
    name: z.unknown(),
    option: z.unknown(), // Never emitted, only counts towards validity
  })
  .passthrough();

// Entry of additional_software / additional_features
const ChoiceSchema = z
  .object({
    name: z.unknown(),
    description: z.unknown(),
    options: z.array(OptionSchema).nullish(),
  })
  .passthrough();

const DesktopSchema = z
  .object({
    name: z.unknown(),
    description: z.unknown(),
  })
  .passthrough();

const WelcomePageSchema = z
  .object({
    text: z.unknown(),
  })
  .passthrough();

// Root config schema
export const InstallerConfigSchema = z
  .object({
    welcome_page: WelcomePageSchema.nullish(),
    desktop: z.array(DesktopSchema).nullish(),
    additional_software: z.array(ChoiceSchema).nullish(),
    additional_features: z.array(ChoiceSchema).nullish(),
  })
  .passthrough();

// TypeScript types derived from Zod schemas
export type InstallerConfig = z.infer<typeof InstallerConfigSchema>;
export type WelcomePage = z.infer<typeof WelcomePageSchema>;
export type DesktopEntry = z.infer<typeof DesktopSchema>;
export type ChoiceEntry = z.infer<typeof ChoiceSchema>;
export type OptionEntry = z.infer<typeof OptionSchema>;

/**
 * Custom error for configs that cannot be parsed or have the wrong shape
 */
export class ConfigParseError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigParseError';
  }

  /**
   * Get formatted error details
   */
  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}

/**
 * Custom error for configs that cannot be read from disk
 */
export class ConfigLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigLoadError';
  }
}
