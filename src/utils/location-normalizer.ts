import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const LOCATIONS_PATH = fileURLToPath(new URL('../../data/locations.json', import.meta.url));

const locationDataSchema = z.object({
  aliases: z.record(z.string()),
  states: z.record(z.string()),
  remoteIndicators: z.array(z.string()),
});

const locationData = locationDataSchema.parse(JSON.parse(readFileSync(LOCATIONS_PATH, 'utf-8')));

const aliases = new Map(Object.entries(locationData.aliases));
const states = new Map(Object.entries(locationData.states));

/**
 * "st. louis" → "St. Louis"
 */
export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

/**
 * Canonical display form of a free-text location:
 * aliases (sf, nyc, wfh), "city, st" with the state spelled out, or title case
 */
export function normalizeLocation(raw: string | null | undefined): string | null {
  if (!raw) {
    return null;
  }

  const cleaned = raw
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[^\w\s,.-]/g, '')
    .trim();
  if (!cleaned) {
    return null;
  }

  const alias = aliases.get(cleaned);
  if (alias) {
    return alias;
  }

  const parts = cleaned.split(',').map((part) => part.trim());
  if (parts.length >= 2) {
    const city = titleCase(parts[0] ?? '');
    const statePart = parts[1] ?? '';
    return `${city}, ${states.get(statePart) ?? titleCase(statePart)}`;
  }

  return states.get(cleaned) ?? titleCase(cleaned);
}

export function isRemoteLocation(raw: string | null | undefined): boolean {
  if (!raw) {
    return false;
  }
  const lower = raw.toLowerCase();
  return locationData.remoteIndicators.some((indicator) => lower.includes(indicator));
}
