/**
 * Theme catalog used to group requirements under synthesized parent controls.
 *
 * Catalog order matters: when a requirement matches several themes and no
 * group exists yet for any of them, the first theme in catalog order wins.
 */

import { z } from 'zod';
import themeCatalog from './themes.json';

const ThemeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.string().min(1),
  description: z.string().default(''),
  keywords: z.array(z.string().min(1)).min(1),
});

export type Theme = z.infer<typeof ThemeSchema>;

export function parseThemeCatalog(input: unknown): readonly Theme[] {
  const parsed = z.array(ThemeSchema).safeParse(input);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid theme catalog:\n${msg}`);
  }
  return parsed.data;
}

export const DEFAULT_THEMES: readonly Theme[] = parseThemeCatalog(themeCatalog);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const keywordPatterns = new Map<string, RegExp>();

function keywordPattern(keyword: string): RegExp {
  let pattern = keywordPatterns.get(keyword);
  if (!pattern) {
    const body = escapeRegExp(keyword.toLowerCase()).replace(/\s+/g, '\\s+');
    pattern = new RegExp(`(?:^|[^a-z0-9])${body}(?![a-z0-9])`, 'i');
    keywordPatterns.set(keyword, pattern);
  }
  return pattern;
}

/**
 * Whether any keyword of the theme occurs as a whole word
 */
export function matchesTheme(text: string, theme: Theme): boolean {
  return theme.keywords.some((keyword) => keywordPattern(keyword).test(text));
}

/**
 * All themes matching the text, in catalog order
 */
export function matchThemes(text: string, themes: readonly Theme[] = DEFAULT_THEMES): Theme[] {
  return themes.filter((theme) => matchesTheme(text, theme));
}
