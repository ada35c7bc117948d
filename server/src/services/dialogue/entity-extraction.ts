/**
 * Entity Extraction
 * Deterministic lexical extraction of named bottles/cigars, intensity,
 * hunt intent and area hints from a single message.
 */

import { z } from 'zod';
import knownEntities from '../../data/known-entities.json' with { type: 'json' };
import { extractPostalCode } from '../places/geocoding/postal-code.js';
import type { StoreCategory } from '../places/models/types.js';
import { escapeRegExp, findPhrase, phraseIndex, titleCase } from '../../utils/text-match.js';
import type { EntityCategory, HuntTarget, Intensity } from './dialogue.types.js';

const IntensitySchema = z.enum(['mild', 'medium', 'full']);

const KnownEntitySchema = z.object({
  name: z.string(),
  aliases: z.array(z.string()).min(1),
  strength: IntensitySchema
});

const KnownEntitiesSchema = z.object({
  spirit: z.array(KnownEntitySchema),
  cigar: z.array(KnownEntitySchema)
});

const KNOWN_ENTITIES = KnownEntitiesSchema.parse(knownEntities);

export interface ExtractedEntity {
  category: EntityCategory;
  name: string;
  strength: Intensity;
  /** Offset of the first alias hit; mentions are returned in message order */
  index: number;
}

/** Generic spirit words that can stand in as a pairing subject */
export const GENERIC_SPIRITS = ['bourbon', 'rye', 'whiskey', 'whisky', 'scotch', 'tequila', 'rum', 'cognac'] as const;

const INTENSITY_WORDS: ReadonlyArray<readonly [Intensity, readonly string[]]> = [
  ['mild', ['mild', 'light', 'smooth', 'mellow']],
  ['medium', ['medium']],
  ['full', ['full', 'bold', 'strong', 'heavy']]
];

const STORE_MARKERS = [
  'best allocation shops', 'allocation shops', 'best shops', 'best stores',
  'liquor stores', 'liquor store', 'store hunt', 'shops', 'stores'
];

const CIGAR_SHOP_MARKERS = ['cigar shop', 'cigar shops', 'cigar store', 'cigar stores', 'cigar lounge', 'tobacconist', 'humidor', 'smoke shop'];

const GREETINGS = new Set(['help', 'yo', 'hey', 'hi', 'hello', 'sup', 'question']);

/**
 * Known bottles and cigars mentioned in the message.
 * Aliases are tried longest first so "padron 1926" wins over a shorter alias.
 */
export function extractEntities(message: string): ExtractedEntity[] {
  const text = message.toLowerCase();
  const found: ExtractedEntity[] = [];

  for (const category of ['spirit', 'cigar'] as const) {
    for (const entity of KNOWN_ENTITIES[category]) {
      const aliases = [...entity.aliases].sort((a, b) => b.length - a.length);
      for (const alias of aliases) {
        const index = phraseIndex(text, alias);
        if (index >= 0) {
          found.push({ category, name: entity.name, strength: entity.strength, index });
          break;
        }
      }
    }
  }

  return found.sort((a, b) => a.index - b.index);
}

/** Replaces every known alias with spaces (same length, so offsets stay valid) */
export function maskEntityNames(message: string): string {
  let masked = message.toLowerCase();
  for (const category of ['spirit', 'cigar'] as const) {
    for (const entity of KNOWN_ENTITIES[category]) {
      for (const alias of entity.aliases) {
        masked = masked.replace(new RegExp(`(^|[^a-z0-9])${escapeRegExp(alias)}(?=$|[^a-z0-9])`, 'g'),
          (_, lead: string) => lead + ' '.repeat(alias.length));
      }
    }
  }
  return masked;
}

export function extractGenericSpirit(message: string): string | null {
  return findPhrase(message, GENERIC_SPIRITS);
}

export function extractIntensity(message: string): Intensity | null {
  for (const [intensity, words] of INTENSITY_WORDS) {
    if (findPhrase(message, words)) return intensity;
  }
  return null;
}

export interface HuntIntent {
  target: HuntTarget | null;
  category: StoreCategory | null;
}

export function extractHuntIntent(message: string): HuntIntent {
  const category: StoreCategory | null = findPhrase(message, CIGAR_SHOP_MARKERS) ? 'cigars' : null;
  const bottle = extractEntities(message).find(entity => entity.category === 'spirit');

  if (bottle) {
    return { target: { kind: 'bottle', name: bottle.name }, category: category ?? 'spirits' };
  }
  if (findPhrase(message, STORE_MARKERS) || category) {
    return { target: { kind: 'best_shops' }, category };
  }
  return { target: null, category };
}

const CITY_STATE_PATTERN = /([A-Za-z][A-Za-z.' -]*),\s*([A-Z]{2})\b/;

/**
 * Area hint in the message: a postal code, a "City, ST" pair, or one of the
 * known area names. null when none is present.
 */
export function extractArea(message: string, knownAreas: readonly string[] = []): string | null {
  const postal = extractPostalCode(message);
  if (postal) return postal;

  const cityState = CITY_STATE_PATTERN.exec(message);
  if (cityState) {
    const [, before = '', state = ''] = cityState;
    // Keep only the capitalised run right before the comma: "hunt in Fort Worth, TX" -> "Fort Worth"
    const words = before.trim().split(/\s+/);
    const cityWords: string[] = [];
    for (let i = words.length - 1; i >= 0; i--) {
      const word = words[i] ?? '';
      if (!/^[A-Z]/.test(word)) break;
      cityWords.unshift(word);
    }
    if (cityWords.length > 0) {
      return `${cityWords.join(' ')}, ${state}`;
    }
  }

  const sorted = [...knownAreas].sort((a, b) => b.length - a.length);
  const known = findPhrase(message, sorted);
  return known ? titleCase(known) : null;
}

export function isGreeting(message: string): boolean {
  const t = message.trim().toLowerCase().replace(/[!?.]+$/, '');
  return GREETINGS.has(t) || t.length < 3;
}
