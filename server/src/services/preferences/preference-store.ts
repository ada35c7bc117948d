/**
 * Preference Store
 * Long-lived per-user preferences: preferred cigar strength, favourites and
 * a short interaction history. In memory; the interface is the seam for a
 * persistent implementation.
 */

import type { EntityCategory, Intensity, Mode } from '../dialogue/dialogue.types.js';

export interface InteractionRecord {
  entity: string;
  category: EntityCategory;
  mode: Mode;
  at: string;
}

export interface PreferenceRecord {
  userId: string;
  preferredCigarStrength: Intensity | null;
  favoriteBourbons: string[];
  favoriteCigars: string[];
  recentInteractions: InteractionRecord[];
}

export interface PreferenceStore {
  getUserPreferences(userId: string): Promise<PreferenceRecord>;
  recordInteraction(userId: string, entity: { name: string; category: EntityCategory }, mode: Mode): Promise<void>;
  setPreferredCigarStrength(userId: string, strength: Intensity): Promise<void>;
}

const MAX_INTERACTIONS = 20;
/** Mentions of the same entity before it becomes a favourite */
const FAVORITE_THRESHOLD = 3;

function emptyRecord(userId: string): PreferenceRecord {
  return {
    userId,
    preferredCigarStrength: null,
    favoriteBourbons: [],
    favoriteCigars: [],
    recentInteractions: []
  };
}

export class InMemoryPreferenceStore implements PreferenceStore {
  private records = new Map<string, PreferenceRecord>();
  private mentionCounts = new Map<string, number>();

  constructor(private readonly now: () => Date = () => new Date()) { }

  async getUserPreferences(userId: string): Promise<PreferenceRecord> {
    const record = this.records.get(userId) ?? emptyRecord(userId);
    return structuredClone(record);
  }

  async recordInteraction(userId: string, entity: { name: string; category: EntityCategory }, mode: Mode): Promise<void> {
    const record = this.records.get(userId) ?? emptyRecord(userId);
    record.recentInteractions = [
      ...record.recentInteractions,
      { entity: entity.name, category: entity.category, mode, at: this.now().toISOString() }
    ].slice(-MAX_INTERACTIONS);

    const countKey = `${userId}:${entity.category}:${entity.name.toLowerCase()}`;
    const count = (this.mentionCounts.get(countKey) ?? 0) + 1;
    this.mentionCounts.set(countKey, count);

    const favorites = entity.category === 'spirit' ? record.favoriteBourbons : record.favoriteCigars;
    if (count >= FAVORITE_THRESHOLD && !favorites.includes(entity.name)) {
      favorites.push(entity.name);
    }
    this.records.set(userId, record);
  }

  async setPreferredCigarStrength(userId: string, strength: Intensity): Promise<void> {
    const record = this.records.get(userId) ?? emptyRecord(userId);
    record.preferredCigarStrength = strength;
    this.records.set(userId, record);
  }
}
