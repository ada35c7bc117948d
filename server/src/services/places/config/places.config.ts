import { z } from 'zod';

/**
 * Store search settings.
 *
 * A postal code pins the user to a neighbourhood, so it gets a tighter radius
 * and fewer stops than a city or region name.
 */
const EnvSchema = z.object({
    PLACES_POSTAL_RADIUS_METERS: z.coerce.number().int().min(500).max(50000).default(8047),
    PLACES_CITY_RADIUS_METERS: z.coerce.number().int().min(500).max(50000).default(24140),
    PLACES_POSTAL_MAX_STORES: z.coerce.number().int().min(1).max(20).default(6),
    PLACES_CITY_MAX_STORES: z.coerce.number().int().min(1).max(20).default(10),
    PLACES_TIMEOUT_MS: z.coerce.number().int().positive().default(4000),
    PLACES_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
    PLACES_RETRY_BACKOFF_MS: z
        .string()
        .default('0,250')
        .transform((s) => s.split(',').map((x) => Number(x.trim())).filter((n) => Number.isFinite(n)))
        .refine((arr) => arr.length > 0, { message: 'PLACES_RETRY_BACKOFF_MS must have at least one number' }),
    GEOCODE_CACHE_TTL_MINUTES: z.coerce.number().positive().default(24 * 60),
});

export interface PlacesSettings {
    radius: { postalMeters: number; cityMeters: number };
    maxStores: { postal: number; city: number };
    timeoutMs: number;
    retry: { attempts: number; backoffMs: number[] };
    geocodeCacheTtlMs: number;
}

export function buildPlacesConfig(env: NodeJS.ProcessEnv = process.env): PlacesSettings {
    const parsed = EnvSchema.safeParse({
        PLACES_POSTAL_RADIUS_METERS: env.PLACES_POSTAL_RADIUS_METERS,
        PLACES_CITY_RADIUS_METERS: env.PLACES_CITY_RADIUS_METERS,
        PLACES_POSTAL_MAX_STORES: env.PLACES_POSTAL_MAX_STORES,
        PLACES_CITY_MAX_STORES: env.PLACES_CITY_MAX_STORES,
        PLACES_TIMEOUT_MS: env.PLACES_TIMEOUT_MS,
        PLACES_RETRY_ATTEMPTS: env.PLACES_RETRY_ATTEMPTS,
        PLACES_RETRY_BACKOFF_MS: env.PLACES_RETRY_BACKOFF_MS,
        GEOCODE_CACHE_TTL_MINUTES: env.GEOCODE_CACHE_TTL_MINUTES,
    });

    if (!parsed.success) {
        const issues = parsed.error.flatten().fieldErrors;
        throw new Error(`Invalid Places config: ${JSON.stringify(issues)}`);
    }

    const data = parsed.data;
    return {
        radius: {
            postalMeters: data.PLACES_POSTAL_RADIUS_METERS,
            cityMeters: data.PLACES_CITY_RADIUS_METERS,
        },
        maxStores: {
            postal: data.PLACES_POSTAL_MAX_STORES,
            city: data.PLACES_CITY_MAX_STORES,
        },
        timeoutMs: data.PLACES_TIMEOUT_MS,
        retry: {
            attempts: data.PLACES_RETRY_ATTEMPTS,
            backoffMs: data.PLACES_RETRY_BACKOFF_MS,
        },
        geocodeCacheTtlMs: data.GEOCODE_CACHE_TTL_MINUTES * 60 * 1000,
    };
}

export const PlacesConfig: PlacesSettings = buildPlacesConfig();
