/**
 * Geocoding Service
 * Resolves a free-text area (postal code or city/region) to coordinates plus a
 * canonical label using the Google Geocoding API, with a per-location cache.
 *
 * Bare 5-digit postal codes are pinned to the configured country; without the
 * component filter "30344" can resolve to a postal code on another continent.
 */

import { z } from 'zod';
import { logger } from '../../../lib/logger/structured-logger.js';
import { UpstreamError } from '../../../lib/errors/upstream-error.js';
import type { RetryPolicy } from '../../../lib/reliability/retry-policy.js';
import { fetchJson } from '../../../utils/fetch-json.js';
import { GeocodeCache } from '../cache/geocode-cache.js';
import type { GeocodeResult } from '../models/types.js';
import { isPostalCode } from './postal-code.js';

const GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

const GeocodeResponseSchema = z.object({
    status: z.string(),
    error_message: z.string().optional(),
    results: z.array(z.object({
        formatted_address: z.string(),
        geometry: z.object({
            location: z.object({ lat: z.number(), lng: z.number() })
        }),
        address_components: z.array(z.object({
            short_name: z.string(),
            types: z.array(z.string())
        })).default([])
    })).default([])
});

export interface Geocoder {
    /** null when the service has no match for the query */
    geocode(query: string): Promise<GeocodeResult | null>;
}

export interface GoogleGeocoderOptions {
    apiKey: string | undefined;
    countryCode: string;
    retryPolicy: RetryPolicy;
    cache?: GeocodeCache;
}

export class GoogleGeocoder implements Geocoder {
    private readonly cache: GeocodeCache;

    constructor(private readonly options: GoogleGeocoderOptions) {
        this.cache = options.cache ?? new GeocodeCache();
    }

    async geocode(query: string): Promise<GeocodeResult | null> {
        const trimmed = query.trim();
        if (!trimmed) return null;

        const cached = this.cache.get(trimmed);
        if (cached) {
            logger.debug({ provider: 'google_geocoding', query: trimmed, cache: this.cache.getStats() }, '[Geocoder] Cache hit');
            return cached;
        }

        const apiKey = this.options.apiKey;
        if (!apiKey) {
            throw new UpstreamError('GOOGLE_API_KEY not configured', {
                kind: 'NOT_CONFIGURED',
                provider: 'google_geocoding',
                stage: 'geocode'
            });
        }

        const url = this.buildUrl(trimmed, apiKey);
        const startTime = Date.now();

        const result = await this.options.retryPolicy.execute('geocode', async (signal) => {
            const raw = await fetchJson(url, { method: 'GET' }, { provider: 'google_geocoding', stage: 'geocode', signal });
            return this.parse(raw);
        });

        logger.info({
            provider: 'google_geocoding',
            query: trimmed,
            postalCode: isPostalCode(trimmed),
            found: result !== null,
            label: result?.label,
            durationMs: Date.now() - startTime
        }, '[Geocoder] Geocode completed');

        if (result) {
            this.cache.set(trimmed, result);
        }
        return result;
    }

    private buildUrl(query: string, apiKey: string): string {
        const url = new URL(GEOCODE_URL);
        url.searchParams.set('address', query);
        url.searchParams.set('key', apiKey);

        const country = this.options.countryCode;
        if (isPostalCode(query)) {
            url.searchParams.set('components', `postal_code:${query.slice(0, 5)}|country:${country}`);
        } else {
            url.searchParams.set('region', country.toLowerCase());
        }
        return url.toString();
    }

    private parse(raw: unknown): GeocodeResult | null {
        const parsed = GeocodeResponseSchema.safeParse(raw);
        if (!parsed.success) {
            throw new UpstreamError('Geocoding response did not match the expected shape', {
                kind: 'API_STATUS',
                provider: 'google_geocoding',
                stage: 'geocode',
                apiStatus: 'MALFORMED'
            });
        }

        const data = parsed.data;
        if (data.status === 'ZERO_RESULTS') {
            return null;
        }
        if (data.status !== 'OK') {
            throw new UpstreamError(data.error_message || `Geocoding status ${data.status}`, {
                kind: 'API_STATUS',
                provider: 'google_geocoding',
                stage: 'geocode',
                apiStatus: data.status
            });
        }

        const first = data.results[0];
        if (!first) return null;

        const country = first.address_components.find(c => c.types.includes('country'));
        return {
            location: { lat: first.geometry.location.lat, lng: first.geometry.location.lng },
            label: first.formatted_address,
            ...(country && { countryCode: country.short_name })
        };
    }
}
