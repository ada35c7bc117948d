/**
 * Hunt handler
 * Resolves stores for the area, then layers on market guidance and bottle pricing.
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import type { StoreResolver } from '../../places/store-resolution.service.js';
import type { StoreRecord, StoreResolution } from '../../places/models/types.js';
import type { HuntOutput, LabeledItem } from '../dialogue.types.js';
import type { HuntSlots } from '../slot-gate.js';
import { pricingItems } from './pricing.js';
import { marketForState, stateFromLabel } from './retail-market.js';

export function placeholderStop(label: string): StoreRecord {
  return {
    name: `Placeholder: no verified stores for ${label}`,
    address: '',
    notes: 'Store lookup came back empty or was unavailable. Call local independents and ask how they handle allocations.',
    provenance: 'placeholder'
  };
}

function degradedNote(resolution: StoreResolution): string {
  return resolution.stores.length > 0
    ? 'Live store search is unavailable right now, so these stops come from my curated list only.'
    : 'Live store search is unavailable right now and I have no curated stores for this area yet.';
}

export class HuntHandler {
  constructor(private readonly stores: StoreResolver) { }

  async run(slots: HuntSlots): Promise<HuntOutput> {
    const resolution = await this.stores.resolveStores(slots.area, slots.category);
    const { label } = resolution;

    const stops = resolution.stores.length > 0 ? resolution.stores : [placeholderStop(label)];
    if (resolution.stores.length === 0) {
      logger.info({ event: 'hunt_placeholder_stop', area: slots.area, label, degraded: resolution.degraded },
        '[Hunt] No stores resolved, using placeholder');
    }

    return slots.category === 'cigars'
      ? this.cigarOutput(label, stops, resolution)
      : this.spiritsOutput(slots, label, stops, resolution);
  }

  private spiritsOutput(slots: HuntSlots, label: string, stops: StoreRecord[], resolution: StoreResolution): HuntOutput {
    const keyPoints: string[] = [];
    const items: LabeledItem[] = [];
    const targetBottles: string[] = [];
    let storeTargets = ['Independent shops', 'Lottery-based chains'];

    const market = marketForState(stateFromLabel(label) ?? stateFromLabel(slots.area) ?? '');
    if (market) {
      keyPoints.push(market.tip);
      storeTargets = [...market.storeTargets];
      items.push({ label: 'Market', value: market.name });
    }

    let summary: string;
    let nextStep: string;
    if (slots.target?.kind === 'bottle') {
      const bottle = slots.target.name;
      summary = `Here's how to hunt ${bottle} in ${label}.`;
      keyPoints.push(
        'Specific bottles usually move through lists, raffles, or relationships.',
        'Ask about drop timing and qualification rules.'
      );
      items.push(
        { label: 'Target', value: bottle },
        { label: 'Method', value: 'Lists, raffles, relationship' },
        ...pricingItems(bottle)
      );
      targetBottles.push(bottle);
      nextStep = 'Call 2 shops and ask how that bottle is released.';
    } else {
      summary = `Here are the best starting moves to hunt allocations near ${label}.`;
      keyPoints.push(
        'Independent shops + loyalty programs give you the best odds.',
        'Timing beats luck: ask for drop days.'
      );
      nextStep = slots.target
        ? 'Visit the first two stops and ask how they run allocations.'
        : 'Tell me a bottle you are chasing and I will tailor the plan.';
    }

    if (resolution.degraded) {
      keyPoints.push(degradedNote(resolution));
    }

    return { mode: 'hunt', summary, keyPoints, items, nextStep, stops, targetBottles, storeTargets };
  }

  private cigarOutput(label: string, stops: StoreRecord[], resolution: StoreResolution): HuntOutput {
    const keyPoints = [
      'Walk-in humidors beat shelf cases for freshness.',
      'Ask what arrived this week; boutique drops sell through fast.'
    ];
    if (resolution.degraded) {
      keyPoints.push(degradedNote(resolution));
    }
    return {
      mode: 'hunt',
      summary: `Here are cigar shops to check near ${label}.`,
      keyPoints,
      items: [],
      nextStep: 'Call ahead and ask about lounge hours and new arrivals.',
      stops,
      targetBottles: [],
      storeTargets: ['Tobacconists with walk-in humidors', 'Cigar lounges']
    };
  }
}
