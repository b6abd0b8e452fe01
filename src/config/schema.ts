/**
 * Configuration Schema
 *
 * Defines the shape of config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 * Unknown keys are rejected so typos surface instead of being ignored.
 */

import { z } from 'zod';
import { ACCENT_COLORS } from '../navigation/types.js';
import { THEME_PRESETS } from '../navigation/presets.js';

const widthSchema = z.number().int().min(20).max(500);

export const LayoutSettingsSchema = z
  .object({
    items_per_page: z.number().int().min(1).max(100).describe('Items shown per page (1-100)'),
    center_horizontally: z.boolean().describe('Center content horizontally'),
    center_vertically: z.boolean().describe('Center content vertically'),
    auto_resize: z.boolean().describe('Derive content width from terminal width'),
    min_content_width: widthSchema.describe('Lower bound of the content width (20-500)'),
    max_content_width: widthSchema.describe('Upper bound of the content width (20-500)'),
    vertical_padding: z.number().int().min(0).max(20).describe('Rows above the header'),
  })
  .strict();

export const ThemeSettingsSchema = z
  .object({
    preset: z.enum(THEME_PRESETS).describe('Named theme'),
    selected_prefix: z.string().optional().describe('Overrides the preset marker for selected items'),
    unselected_prefix: z.string().optional().describe('Overrides the preset marker for unselected items'),
    use_colors: z.boolean().describe('Highlight the cursor line in color'),
    accent_color: z.enum(ACCENT_COLORS).describe('Highlight color'),
  })
  .strict();

export const TextSettingsSchema = z
  .object({
    section_title: z.string(),
    item_title_prefix: z.string(),
    empty_section_message: z.string(),
    help_sections: z.string(),
    help_items: z.string(),
    show_help: z.boolean(),
    show_page_numbers: z.boolean(),
    show_counters: z.boolean(),
    show_descriptions: z.boolean(),
  })
  .strict();

export const KeySettingsSchema = z
  .object({
    quick_select: z.boolean().describe('Digits 1-9 jump to a section or page'),
    vim_keys: z.boolean().describe('j/k move, h goes back'),
  })
  .strict();

const BaseConfigSchema = z
  .object({
    layout: LayoutSettingsSchema,
    theme: ThemeSettingsSchema,
    text: TextSettingsSchema,
    keys: KeySettingsSchema,
  })
  .strict();

/**
 * Root configuration schema
 * This is the complete shape of config.toml after merging with defaults
 */
export const ConfigSchema = BaseConfigSchema.superRefine((config, ctx) => {
  if (config.layout.max_content_width < config.layout.min_content_width) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['layout', 'max_content_width'],
      message: 'Must be greater than or equal to layout.min_content_width',
    });
  }
});

export type Config = z.infer<typeof BaseConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = BaseConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
