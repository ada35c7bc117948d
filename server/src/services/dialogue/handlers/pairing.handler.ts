/**
 * Pairing handler
 * Spirit subject -> cigar sized to the intensity slot.
 * Cigar subject -> bourbon sized to the cigar's strength.
 */

import { z } from 'zod';
import guideData from '../../../data/pairing-guide.json' with { type: 'json' };
import type { Intensity, LabeledItem, PairingDetail, PairingOutput } from '../dialogue.types.js';
import type { PairingSlots } from '../slot-gate.js';

const StrengthKeyed = <T extends z.ZodTypeAny>(schema: T) => z.object({ mild: schema, medium: schema, full: schema });

const PairingGuideSchema = z.object({
  cigarsByStrength: StrengthKeyed(z.array(z.object({ name: z.string(), wrapper: z.string() })).min(1)),
  bourbonsByStrength: StrengthKeyed(z.object({
    profile: z.string(),
    proofRange: z.string(),
    bottles: z.array(z.string()).min(1)
  }))
});

const GUIDE = PairingGuideSchema.parse(guideData);

const STRENGTH_LABEL: Record<Intensity, string> = {
  mild: 'Mild',
  medium: 'Medium',
  full: 'Full'
};

function cigarPairings(spiritName: string, intensity: Intensity): PairingDetail[] {
  return GUIDE.cigarsByStrength[intensity].map((cigar, index): PairingDetail => ({
    name: cigar.name,
    category: 'cigar',
    strength: intensity,
    why: [
      `${cigar.wrapper} wrapper sits at the same weight as ${spiritName}`,
      intensity === 'full'
        ? 'Dark, heavy smoke stands up to oak and proof'
        : 'Earthy sweetness complements oak and caramel notes'
    ],
    pour: 'Neat',
    quality_tag: index === 0 ? 'Top Shelf' : null
  }));
}

function bourbonPairings(cigarName: string, intensity: Intensity): PairingDetail[] {
  const tier = GUIDE.bourbonsByStrength[intensity];
  return tier.bottles.map((bottle, index): PairingDetail => ({
    name: bottle,
    category: 'spirit',
    strength: intensity,
    why: [
      `${tier.profile} (${tier.proofRange} proof) matches the body of ${cigarName}`,
      'Balanced pour will not bury the wrapper'
    ],
    pour: intensity === 'full' ? 'Neat, with a splash of water' : 'Neat',
    quality_tag: index === 0 ? 'Top Shelf' : null
  }));
}

export function runPairing(slots: PairingSlots): PairingOutput {
  const { subject, intensity } = slots;
  const forCigar = subject.category === 'cigar';
  const [primary, ...alternatives] = forCigar
    ? bourbonPairings(subject.name, intensity)
    : cigarPairings(subject.name, intensity);

  const items: LabeledItem[] = [
    { label: 'Subject', value: subject.name },
    { label: 'Strength', value: STRENGTH_LABEL[intensity] }
  ];
  if (slots.topic) {
    items.push({ label: 'Topic', value: slots.topic });
  }

  const keyPoints = [
    'Balance matters more than matching strength.',
    forCigar ? 'Let the pour support the cigar, not compete.' : 'Let the cigar support the pour, not compete.'
  ];
  if (slots.intensityDefaulted) {
    keyPoints.push('I assumed a medium-bodied cigar. Tell me mild, medium or full to adjust.');
  }

  return {
    mode: 'pairing',
    summary: forCigar
      ? `Here's a bourbon to pour with ${subject.name}.`
      : `Here's a cigar pairing that works with ${subject.name}.`,
    keyPoints,
    items,
    nextStep: slots.intensityDefaulted
      ? 'Reply with mild, medium or full and I will re-pair it.'
      : 'Try it once, then tell me if you want it richer or smoother.',
    primary: primary ?? fallbackDetail(forCigar, intensity),
    alternatives
  };
}

function fallbackDetail(forCigar: boolean, intensity: Intensity): PairingDetail {
  return {
    name: forCigar ? 'Bourbon' : 'Nicaraguan Toro',
    category: forCigar ? 'spirit' : 'cigar',
    strength: intensity,
    why: ['Balanced body will not overpower the pairing'],
    pour: 'Neat',
    quality_tag: null
  };
}
