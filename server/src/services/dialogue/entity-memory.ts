/**
 * Entity Memory
 *
 * Per-session "last discussed" slot per category plus pronoun resolution.
 *
 * Resolution rules, in order:
 * - no pronoun in the message -> null
 * - pairing vocabulary + vocabulary of exactly one category -> latest entity of the OTHER category
 *   ("what bourbon pairs with it" after a cigar -> that cigar)
 * - vocabulary of exactly one category, no pairing words -> latest entity of that category
 * - otherwise -> latest entity overall
 * - nothing recorded for the needed category -> null; the caller asks instead of guessing
 */

import { findPhrase } from '../../utils/text-match.js';
import { GENERIC_SPIRITS } from './entity-extraction.js';
import type { DialogueSession, EntityCategory, EntityRecord } from './dialogue.types.js';

const PRONOUNS = ['it', 'that', 'them', 'this', 'they', 'those'] as const;

const CATEGORY_VOCABULARY: Record<EntityCategory, readonly string[]> = {
  spirit: [...GENERIC_SPIRITS, 'pour', 'bottle', 'spirit', 'drink', 'dram'],
  cigar: ['cigar', 'cigars', 'stick', 'smoke', 'humidor', 'wrapper']
};

const PAIRING_VOCABULARY = ['pair', 'pairs', 'pairing', 'paired', 'goes with', 'go with', 'match', 'matches', 'smoke with', 'sip with', 'drink with'];

export interface PronounResolution {
  /** Category of the entity the pronoun points at */
  category: EntityCategory;
  entityName: string;
  /** What the user is asking for, when the pronoun sits in a pairing question */
  requested: string | null;
  /** "bourbon-pairing-for-<name>" for pairing questions, the entity name otherwise */
  topic: string;
}

export function otherCategory(category: EntityCategory): EntityCategory {
  return category === 'spirit' ? 'cigar' : 'spirit';
}

export function recordEntity(
  session: DialogueSession,
  category: EntityCategory,
  name: string,
  attributes: Record<string, string> = {}
): EntityRecord {
  session.entitySeq += 1;
  const record: EntityRecord = { name, category, attributes, seq: session.entitySeq };
  session.entities[category] = record;
  return record;
}

export function latestEntity(session: DialogueSession, category?: EntityCategory): EntityRecord | null {
  if (category) {
    return session.entities[category] ?? null;
  }
  const spirit = session.entities.spirit;
  const cigar = session.entities.cigar;
  if (spirit && cigar) return spirit.seq > cigar.seq ? spirit : cigar;
  return spirit ?? cigar ?? null;
}

export function hasPronoun(message: string): boolean {
  return findPhrase(message, PRONOUNS) !== null;
}

export function hasPairingVocabulary(message: string): boolean {
  return findPhrase(message, PAIRING_VOCABULARY) !== null;
}

function referencedCategories(message: string): EntityCategory[] {
  return (['spirit', 'cigar'] as const).filter(category => findPhrase(message, CATEGORY_VOCABULARY[category]) !== null);
}

/** Word used for the requested side in a pairing topic */
function requestedLabel(category: EntityCategory, message: string): string {
  if (category === 'cigar') return 'cigar';
  return findPhrase(message, GENERIC_SPIRITS) ?? 'bourbon';
}

export function resolvePronoun(message: string, session: DialogueSession): PronounResolution | null {
  if (!hasPronoun(message)) return null;

  const pairing = hasPairingVocabulary(message);
  const categories = referencedCategories(message);
  const onlyCategory = categories.length === 1 ? categories[0] : undefined;

  let entity: EntityRecord | null;
  if (onlyCategory) {
    entity = latestEntity(session, pairing ? otherCategory(onlyCategory) : onlyCategory);
  } else {
    entity = latestEntity(session);
  }
  if (!entity) return null;

  if (!pairing) {
    return { category: entity.category, entityName: entity.name, requested: null, topic: entity.name };
  }

  const requested = requestedLabel(otherCategory(entity.category), message);
  return {
    category: entity.category,
    entityName: entity.name,
    requested,
    topic: `${requested}-pairing-for-${entity.name}`
  };
}
