/**
 * Menu File Schema
 *
 * A menu file (.json or .toml) lists the sections and items to present:
 *
 * ```toml
 * title = "Workstation setup"
 *
 * [[sections]]
 * name = "Privacy"
 * description = "Stop apps from reading personal data"
 *
 * [[sections.items]]
 * name = "Location"
 * selected = true
 * ```
 */

import { z } from 'zod';

export const MenuItemSchema = z.object({
  name: z.string().min(1).describe('Item label'),
  description: z.string().optional(),
  selected: z.boolean().optional().describe('Initial selection state'),
  id: z.number().int().optional(),
});

export const MenuSectionSchema = z.object({
  name: z.string().min(1).describe('Section label'),
  description: z.string().optional(),
  items: z.array(MenuItemSchema).default([]),
});

export const MenuSchema = z.object({
  /** Replaces the section list heading */
  title: z.string().optional(),
  sections: z.array(MenuSectionSchema).min(1, 'A menu needs at least one section'),
});

export type MenuItem = z.infer<typeof MenuItemSchema>;
export type MenuSection = z.infer<typeof MenuSectionSchema>;
export type Menu = z.infer<typeof MenuSchema>;
