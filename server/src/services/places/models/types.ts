export interface LatLng {
    lat: number;
    lng: number;
}

/** What the hunt is looking for: allocated bottles or a cigar humidor */
export type StoreCategory = 'spirits' | 'cigars';

/**
 * local = the hint was a postal code, broad = a city/region name
 */
export type SearchBreadth = 'local' | 'broad';

export type Provenance = 'curated' | 'live' | 'placeholder';

export interface StoreRecord {
    name: string;
    address: string;
    phone?: string;
    location?: LatLng;
    notes: string;
    provenance: Provenance;
}

/** A venue as returned by the place search service, before filtering */
export interface PlaceCandidate {
    placeId: string;
    name: string;
    address: string;
    types: string[];
    location?: LatLng;
    phone?: string;
}

export interface GeocodeResult {
    location: LatLng;
    label: string;
    countryCode?: string;
}

export interface StoreResolution {
    label: string;
    stores: StoreRecord[];
    breadth: SearchBreadth;
    /** True when the geocoder or place search failed and live results are missing */
    degraded: boolean;
}

/** A curated venue entry as kept in the static table */
export interface CuratedStoreEntry {
    name: string;
    address: string;
    phone?: string;
    lat?: number;
    lng?: number;
    allocationType?: string;
    notes: string;
    website?: string;
}
