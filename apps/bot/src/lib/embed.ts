import { EmbedBuilder } from 'discord.js';

/* ──────────── Brand Colors ──────────── */
export const Colors = {
  BRAND: 0x8b5cf6,
  BRAND_SKY: 0x78b7ff,
  BRAND_MINT: 0x39d3b3,
  BRAND_LEMON: 0xffd36a,

  SUCCESS: 0x22c55e,
  ERROR: 0xef4444,
  WARNING: 0xf59e0b,
  INFO: 0x5865f2,
  MUTED: 0x64748b
} as const;

/* ──────────── Visual Helpers ──────────── */
export const LINE = '───────────────────────';

export function statLine(emoji: string, label: string, value: string): string {
  return `${emoji} ${label}  ${value}`;
}

export function mention(userId: string): string {
  return `<@${userId}>`;
}

/* ──────────── Embed Builders ──────────── */

export function brandEmbed(): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(Colors.BRAND)
    .setTimestamp();
}

export function successEmbed(title: string, description?: string): EmbedBuilder {
  const e = brandEmbed().setColor(Colors.SUCCESS).setTitle(`✅ ${title}`);
  if (description) e.setDescription(description);
  return e;
}

export function errorEmbed(title: string, description?: string): EmbedBuilder {
  const e = brandEmbed().setColor(Colors.ERROR).setTitle(`❌ ${title}`);
  if (description) e.setDescription(description);
  return e;
}

export function warningEmbed(title: string, description?: string): EmbedBuilder {
  const e = brandEmbed().setColor(Colors.WARNING).setTitle(`⚠️ ${title}`);
  if (description) e.setDescription(description);
  return e;
}

export function mutedEmbed(title: string, description?: string): EmbedBuilder {
  const e = brandEmbed().setColor(Colors.MUTED).setTitle(`⏳ ${title}`);
  if (description) e.setDescription(description);
  return e;
}

export function infoEmbed(title: string, description?: string): EmbedBuilder {
  const e = brandEmbed().setColor(Colors.INFO).setTitle(title);
  if (description) e.setDescription(description);
  return e;
}
