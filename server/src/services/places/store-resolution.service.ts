/**
 * Store Resolution Pipeline
 *
 * curated lookup -> geocode -> live place search -> filter -> merge -> rank -> cap
 *
 * Upstream failures never escape: a failed geocode returns curated stores under
 * the raw hint, a failed place search returns curated stores under the geocoded
 * label. Both mark the resolution as degraded.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { isUpstreamError } from '../../lib/errors/upstream-error.js';
import { PlacesConfig, type PlacesSettings } from './config/places.config.js';
import { formatCuratedNotes, type CuratedStoreLookup } from './curated/curated-stores.js';
import { evaluateCandidate, matchesExclusion, scoreCandidate, DEFAULT_FILTER_RULES, type StoreFilterRules } from './filters/store-filters.js';
import type { Geocoder } from './geocoding/geocoding.service.js';
import { extractPostalCode } from './geocoding/postal-code.js';
import type { PlaceSearchClient } from './client/google-places.client.js';
import type {
    CuratedStoreEntry,
    GeocodeResult,
    PlaceCandidate,
    SearchBreadth,
    StoreCategory,
    StoreRecord,
    StoreResolution
} from './models/types.js';

export interface StoreResolverDeps {
    curated: CuratedStoreLookup;
    geocoder: Geocoder;
    places: PlaceSearchClient;
    settings?: PlacesSettings;
    filterRules?: StoreFilterRules;
}

/** Case-insensitive, whitespace-collapsed store name used for dedupe */
export function storeNameKey(name: string): string {
    return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function searchBreadthFor(areaHint: string): SearchBreadth {
    return extractPostalCode(areaHint) !== null ? 'local' : 'broad';
}

function describeError(error: unknown): Record<string, unknown> {
    if (isUpstreamError(error)) {
        return { errorKind: error.kind, provider: error.provider, statusCode: error.statusCode, apiStatus: error.apiStatus };
    }
    return { error: error instanceof Error ? error.message : String(error) };
}

export interface StoreResolver {
    resolveStores(areaHint: string, category?: StoreCategory): Promise<StoreResolution>;
}

export class StoreResolutionService implements StoreResolver {
    private readonly settings: PlacesSettings;
    private readonly filterRules: StoreFilterRules;

    constructor(private readonly deps: StoreResolverDeps) {
        this.settings = deps.settings ?? PlacesConfig;
        this.filterRules = deps.filterRules ?? DEFAULT_FILTER_RULES;
    }

    async resolveStores(areaHint: string, category: StoreCategory = 'spirits'): Promise<StoreResolution> {
        const hint = areaHint.trim();
        const breadth = searchBreadthFor(hint);
        const cap = breadth === 'local' ? this.settings.maxStores.postal : this.settings.maxStores.city;
        const radiusMeters = breadth === 'local' ? this.settings.radius.postalMeters : this.settings.radius.cityMeters;

        const curated = this.curatedRecords(hint, category);

        // 5-digit codes geocode better on their own than wrapped in a sentence
        const geocodeQuery = extractPostalCode(hint) ?? hint;
        let geocoded: GeocodeResult | null = null;
        try {
            geocoded = await this.deps.geocoder.geocode(geocodeQuery);
        } catch (error) {
            logger.warn({ event: 'store_pipeline_geocode_failed', areaHint: hint, ...describeError(error) },
                '[StorePipeline] Geocoding failed, using curated stores only');
        }

        if (!geocoded) {
            const stores = curated.slice(0, cap);
            logger.info({
                event: 'store_pipeline_completed',
                areaHint: hint,
                category,
                breadth,
                curatedCount: curated.length,
                liveCount: 0,
                finalCount: stores.length,
                degraded: true
            }, '[StorePipeline] Resolved without geocode');
            return { label: hint, stores, breadth, degraded: true };
        }

        let candidates: PlaceCandidate[] = [];
        let degraded = false;
        try {
            candidates = await this.deps.places.searchNearby({ location: geocoded.location, radiusMeters, category });
        } catch (error) {
            degraded = true;
            logger.warn({ event: 'store_pipeline_search_failed', areaHint: hint, label: geocoded.label, ...describeError(error) },
                '[StorePipeline] Place search failed, using curated stores only');
        }

        const live = this.filterAndRank(candidates, category);
        const stores = this.merge(curated, live).slice(0, cap);

        logger.info({
            event: 'store_pipeline_completed',
            areaHint: hint,
            label: geocoded.label,
            category,
            breadth,
            radiusMeters,
            curatedCount: curated.length,
            rawLiveCount: candidates.length,
            liveCount: live.length,
            finalCount: stores.length,
            degraded
        }, '[StorePipeline] Resolved stores');

        return { label: geocoded.label, stores, breadth, degraded };
    }

    private curatedRecords(hint: string, category: StoreCategory): StoreRecord[] {
        return this.deps.curated.lookup(hint, category)
            .filter(entry => matchesExclusion(entry.name, [], this.filterRules).keep)
            .map(toCuratedRecord);
    }

    private filterAndRank(candidates: PlaceCandidate[], category: StoreCategory): StoreRecord[] {
        const rejected: Record<string, number> = {};
        const kept: Array<{ candidate: PlaceCandidate; score: number }> = [];

        for (const candidate of candidates) {
            const verdict = evaluateCandidate(candidate, category, this.filterRules);
            if (!verdict.keep) {
                rejected[verdict.reason] = (rejected[verdict.reason] ?? 0) + 1;
                continue;
            }
            kept.push({ candidate, score: scoreCandidate(candidate, category, this.filterRules) });
        }

        if (Object.keys(rejected).length > 0) {
            logger.debug({ event: 'store_pipeline_filtered', category, rejected }, '[StorePipeline] Filtered live venues');
        }

        // Stable sort keeps the place service's own relevance order within a score
        return kept
            .sort((a, b) => b.score - a.score)
            .map(({ candidate, score }) => toLiveRecord(candidate, score));
    }

    /** Curated first, in curated order; a live venue never replaces a curated one */
    private merge(curated: StoreRecord[], live: StoreRecord[]): StoreRecord[] {
        const seen = new Set<string>();
        const merged: StoreRecord[] = [];
        for (const record of [...curated, ...live]) {
            const key = storeNameKey(record.name);
            if (!key || seen.has(key)) continue;
            seen.add(key);
            merged.push(record);
        }
        return merged;
    }
}

function toCuratedRecord(entry: CuratedStoreEntry): StoreRecord {
    return {
        name: entry.name,
        address: entry.address,
        ...(entry.phone && { phone: entry.phone }),
        ...(entry.lat !== undefined && entry.lng !== undefined && { location: { lat: entry.lat, lng: entry.lng } }),
        notes: formatCuratedNotes(entry),
        provenance: 'curated'
    };
}

function toLiveRecord(candidate: PlaceCandidate, score: number): StoreRecord {
    const likelihood = score >= 70 ? 'High' : score >= 60 ? 'Medium' : 'Standard';
    return {
        name: candidate.name,
        address: candidate.address,
        ...(candidate.phone && { phone: candidate.phone }),
        ...(candidate.location && { location: candidate.location }),
        notes: `${likelihood} allocation likelihood. Call ahead and ask how they handle allocated releases.`,
        provenance: 'live'
    };
}
