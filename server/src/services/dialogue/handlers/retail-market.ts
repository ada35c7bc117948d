/**
 * US retail market guidance: how allocations move in a state depends on
 * whether independents, chains or the state liquor board run the shelves.
 */

import { z } from 'zod';
import marketData from '../../../data/retail-markets.json' with { type: 'json' };

const RetailMarketSchema = z.object({
  name: z.string(),
  states: z.array(z.string().length(2)),
  tip: z.string(),
  storeTargets: z.array(z.string())
});

const RetailMarketsSchema = z.record(RetailMarketSchema);

export type RetailMarket = z.infer<typeof RetailMarketSchema> & { key: string };

const MARKETS: RetailMarket[] = Object.entries(RetailMarketsSchema.parse(marketData))
  .map(([key, market]) => ({ ...market, key }));

/** Two-letter state in a "City, ST" or "City, ST 12345, USA" label */
const STATE_PATTERN = /,\s*([A-Z]{2})(?:\s+\d{5}(?:-\d{4})?)?\s*(?:,|$)/;

export function stateFromLabel(label: string): string | null {
  return STATE_PATTERN.exec(label)?.[1] ?? null;
}

export function marketForState(state: string): RetailMarket | null {
  const code = state.trim().toUpperCase();
  return MARKETS.find(market => market.states.includes(code)) ?? null;
}
