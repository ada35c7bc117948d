/**
 * Store filters
 *
 * A live venue survives only if nothing marks it as excluded (chain, venue type
 * or entertainment/food keyword) AND it carries a positive indicator for the
 * category being hunted.
 */

import filterData from '../../../data/store-filters.json' with { type: 'json' };
import { containsPhrase } from '../../../utils/text-match.js';
import type { PlaceCandidate, StoreCategory } from '../models/types.js';

interface CategoryRules {
    venueTypes: string[];
    nameIndicators: string[];
    enthusiastKeywords: string[];
}

export interface StoreFilterRules {
    excludedTypes: string[];
    excludedChains: string[];
    excludedNameKeywords: string[];
    categories: Record<StoreCategory, CategoryRules>;
}

export const DEFAULT_FILTER_RULES: StoreFilterRules = filterData;

export type FilterVerdict =
    | { keep: true }
    | { keep: false; reason: 'excluded_type' | 'excluded_chain' | 'excluded_keyword' | 'no_positive_indicator' };

export function matchesExclusion(name: string, types: string[], rules: StoreFilterRules = DEFAULT_FILTER_RULES): FilterVerdict {
    if (types.some(type => rules.excludedTypes.includes(type))) {
        return { keep: false, reason: 'excluded_type' };
    }
    if (rules.excludedChains.some(chain => containsPhrase(name, chain))) {
        return { keep: false, reason: 'excluded_chain' };
    }
    if (rules.excludedNameKeywords.some(keyword => containsPhrase(name, keyword))) {
        return { keep: false, reason: 'excluded_keyword' };
    }
    return { keep: true };
}

export function hasPositiveIndicator(
    candidate: Pick<PlaceCandidate, 'name' | 'types'>,
    category: StoreCategory,
    rules: StoreFilterRules = DEFAULT_FILTER_RULES
): boolean {
    const categoryRules = rules.categories[category];
    if (candidate.types.some(type => categoryRules.venueTypes.includes(type))) {
        return true;
    }
    return categoryRules.nameIndicators.some(indicator => containsPhrase(candidate.name, indicator));
}

export function evaluateCandidate(
    candidate: PlaceCandidate,
    category: StoreCategory,
    rules: StoreFilterRules = DEFAULT_FILTER_RULES
): FilterVerdict {
    const exclusion = matchesExclusion(candidate.name, candidate.types, rules);
    if (!exclusion.keep) return exclusion;
    if (!hasPositiveIndicator(candidate, category, rules)) {
        return { keep: false, reason: 'no_positive_indicator' };
    }
    return { keep: true };
}

/**
 * Allocation likelihood: base 50, +15 for the category's venue type,
 * +10 for enthusiast keywords in the name, capped at 100
 */
export function scoreCandidate(
    candidate: PlaceCandidate,
    category: StoreCategory,
    rules: StoreFilterRules = DEFAULT_FILTER_RULES
): number {
    const categoryRules = rules.categories[category];
    let score = 50;
    if (candidate.types.some(type => categoryRules.venueTypes.includes(type))) {
        score += 15;
    }
    if (categoryRules.enthusiastKeywords.some(keyword => containsPhrase(candidate.name, keyword))) {
        score += 10;
    }
    return Math.min(score, 100);
}
