import { readFileSync } from 'fs';
import { z } from 'zod';

import type { Random } from './types.js';
import { pickOne } from './types.js';

const EmojiCategoriesSchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(10));

export type EmojiCategories = Record<string, string[]>;

let cached: EmojiCategories | null = null;

export function loadEmojiCategories(): EmojiCategories {
  if (cached) return cached;
  const raw: unknown = JSON.parse(readFileSync(new URL('../../data/emojiCategories.json', import.meta.url), 'utf8'));
  cached = EmojiCategoriesSchema.parse(raw);
  return cached;
}

export function categoryNames(): string[] {
  return Object.keys(loadEmojiCategories());
}

export function getCategory(name: string): string[] | null {
  return loadEmojiCategories()[name.toLowerCase()] ?? null;
}

export function randomCategory(random: Random): string {
  return pickOne(categoryNames(), random);
}
