import { z } from 'zod';
import { logger } from '../../../lib/logger/structured-logger.js';
import { UpstreamError } from '../../../lib/errors/upstream-error.js';
import type { RetryPolicy } from '../../../lib/reliability/retry-policy.js';
import { fetchJson } from '../../../utils/fetch-json.js';
import type { LatLng, PlaceCandidate, StoreCategory } from '../models/types.js';

const NEARBY_URL = 'https://places.googleapis.com/v1/places:searchNearby';
const TEXT_URL = 'https://places.googleapis.com/v1/places:searchText';

const PLACES_FIELD_MASK = 'places.id,places.displayName,places.formattedAddress,places.location,places.types,places.nationalPhoneNumber,places.businessStatus';

const MAX_RESULTS = 20;

/**
 * How each category is searched: liquor stores have a dedicated place type,
 * cigar shops do not and go through a text query biased to the same circle.
 */
const CATEGORY_SEARCH: Record<StoreCategory, { includedTypes?: string[]; textQuery?: string }> = {
    spirits: { includedTypes: ['liquor_store'] },
    cigars: { textQuery: 'cigar shop' },
};

const PlaceSchema = z.object({
    id: z.string(),
    displayName: z.object({ text: z.string() }).optional(),
    formattedAddress: z.string().optional(),
    location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
    types: z.array(z.string()).default([]),
    nationalPhoneNumber: z.string().optional(),
    businessStatus: z.string().optional(),
});

const PlacesResponseSchema = z.object({
    places: z.array(PlaceSchema).default([]),
});

export interface NearbySearchParams {
    location: LatLng;
    radiusMeters: number;
    category: StoreCategory;
}

export interface PlaceSearchClient {
    searchNearby(params: NearbySearchParams): Promise<PlaceCandidate[]>;
}

export interface GooglePlacesClientOptions {
    apiKey: string | undefined;
    retryPolicy: RetryPolicy;
}

export class GooglePlacesClient implements PlaceSearchClient {
    constructor(private readonly options: GooglePlacesClientOptions) { }

    async searchNearby(params: NearbySearchParams): Promise<PlaceCandidate[]> {
        const apiKey = this.options.apiKey;
        if (!apiKey) {
            throw new UpstreamError('GOOGLE_API_KEY not configured', {
                kind: 'NOT_CONFIGURED',
                provider: 'google_places_new',
                stage: 'place_search'
            });
        }

        const search = CATEGORY_SEARCH[params.category];
        const url = search.includedTypes ? NEARBY_URL : TEXT_URL;
        const body = this.buildBody(params);
        const startTime = Date.now();

        const places = await this.options.retryPolicy.execute('place_search', async (signal) => {
            const raw = await fetchJson(url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'X-Goog-Api-Key': apiKey,
                    'X-Goog-FieldMask': PLACES_FIELD_MASK
                },
                body: JSON.stringify(body)
            }, { provider: 'google_places_new', stage: 'place_search', signal });
            return this.parse(raw);
        });

        logger.info({
            provider: 'google_places_new',
            method: search.includedTypes ? 'searchNearby' : 'searchText',
            category: params.category,
            radiusMeters: params.radiusMeters,
            resultCount: places.length,
            durationMs: Date.now() - startTime
        }, '[GOOGLE] Place search completed');

        return places;
    }

    private buildBody(params: NearbySearchParams): Record<string, unknown> {
        const circle = {
            center: { latitude: params.location.lat, longitude: params.location.lng },
            radius: params.radiusMeters
        };
        const search = CATEGORY_SEARCH[params.category];

        if (search.includedTypes) {
            return {
                includedTypes: search.includedTypes,
                maxResultCount: MAX_RESULTS,
                locationRestriction: { circle },
                languageCode: 'en'
            };
        }
        return {
            textQuery: search.textQuery,
            pageSize: MAX_RESULTS,
            locationBias: { circle },
            languageCode: 'en'
        };
    }

    private parse(raw: unknown): PlaceCandidate[] {
        const parsed = PlacesResponseSchema.safeParse(raw);
        if (!parsed.success) {
            throw new UpstreamError('Places response did not match the expected shape', {
                kind: 'API_STATUS',
                provider: 'google_places_new',
                stage: 'place_search',
                apiStatus: 'MALFORMED'
            });
        }

        return parsed.data.places
            .filter(place => place.businessStatus !== 'CLOSED_PERMANENTLY')
            .map((place): PlaceCandidate => ({
                placeId: place.id,
                name: place.displayName?.text ?? '',
                address: place.formattedAddress ?? '',
                types: place.types,
                ...(place.location && { location: { lat: place.location.latitude, lng: place.location.longitude } }),
                ...(place.nationalPhoneNumber && { phone: place.nationalPhoneNumber })
            }))
            .filter(candidate => candidate.name.length > 0);
    }
}
