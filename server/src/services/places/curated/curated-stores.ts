/**
 * Curated Store Lookup
 * Hand-maintained venues for a handful of regions, keyed by region id with city aliases.
 */

import { z } from 'zod';
import curatedData from '../../../data/curated-stores.json' with { type: 'json' };
import type { CuratedStoreEntry, StoreCategory } from '../models/types.js';

const CuratedEntrySchema = z.object({
    name: z.string().min(1),
    address: z.string(),
    phone: z.string().optional(),
    lat: z.number().optional(),
    lng: z.number().optional(),
    allocationType: z.string().optional(),
    notes: z.string(),
    website: z.string().optional(),
});

const CuratedTableSchema = z.object({
    regions: z.record(z.array(CuratedEntrySchema)),
    aliases: z.record(z.string()),
});

const CuratedFileSchema = z.object({
    spirits: CuratedTableSchema,
    cigars: CuratedTableSchema,
});

export type CuratedTable = z.infer<typeof CuratedTableSchema>;

export interface CuratedStoreLookup {
    lookup(areaHint: string, category: StoreCategory): CuratedStoreEntry[];
}

export class StaticCuratedStoreLookup implements CuratedStoreLookup {
    private readonly tables: Record<StoreCategory, CuratedTable>;

    constructor(tables?: Record<StoreCategory, CuratedTable>) {
        this.tables = tables ?? CuratedFileSchema.parse(curatedData);
    }

    /**
     * Aliases are matched as substrings of the lowercased hint, in table order,
     * so "Nashville, TN" and "east nashville" both land on the Nashville list.
     */
    lookup(areaHint: string, category: StoreCategory): CuratedStoreEntry[] {
        const hint = areaHint.toLowerCase().trim();
        if (!hint) return [];

        const table = this.tables[category];
        for (const [alias, regionKey] of Object.entries(table.aliases)) {
            if (hint.includes(alias)) {
                return [...(table.regions[regionKey] ?? [])];
            }
        }
        return [];
    }

    /** Every alias across categories, for area extraction */
    knownAreas(): string[] {
        const aliases = new Set<string>();
        for (const table of Object.values(this.tables)) {
            Object.keys(table.aliases).forEach(alias => aliases.add(alias));
        }
        return [...aliases];
    }
}

const ALLOCATION_METHOD_LABELS: Record<string, string> = {
    raffle: 'Raffle',
    points: 'Points program',
    list: 'Allocation list',
    first_come: 'First come, first served',
    lottery: 'Lottery',
    spend_based: 'Spend-based loyalty',
};

/**
 * Notes carry the allocation method up front so it survives into the response
 */
export function formatCuratedNotes(entry: CuratedStoreEntry): string {
    const parts: string[] = [];
    if (entry.allocationType) {
        const label = ALLOCATION_METHOD_LABELS[entry.allocationType] ?? entry.allocationType;
        parts.push(`Allocation method: ${label}.`);
    }
    if (entry.notes) parts.push(entry.notes);
    if (entry.website) parts.push(`Website: ${entry.website}`);
    return parts.join(' ');
}
