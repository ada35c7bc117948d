import { z } from 'zod';
import pricingData from '../../../data/bottle-pricing.json' with { type: 'json' };
import type { LabeledItem } from '../dialogue.types.js';

const BottlePriceSchema = z.object({
  label: z.string(),
  msrp: z.number(),
  secondaryLow: z.number(),
  secondaryHigh: z.number()
});

const PRICES = z.record(BottlePriceSchema).parse(pricingData);

/** MSRP and secondary range for a known allocated bottle; [] when unknown */
export function pricingItems(bottleName: string): LabeledItem[] {
  const price = PRICES[bottleName.trim().toLowerCase()];
  if (!price) return [];
  return [
    { label: 'MSRP', value: `$${price.msrp}` },
    { label: 'Secondary (low)', value: `$${price.secondaryLow}` },
    { label: 'Secondary (high)', value: `$${price.secondaryHigh}` }
  ];
}
