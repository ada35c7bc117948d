/**
 * Mode Router
 *
 * Priority:
 * 1. pending clarification -> its originating mode (message is an answer, not re-classified),
 *    except the lane question: a reply that picks the hunt or pairing lane goes there
 * 2. TRIGGER_RULES, first match wins
 * 3. sticky sub-state left by the previous turn
 * 4. Info
 *
 * A message that fires both pairing and hunt triggers goes to Pairing: the
 * rule order below is the tie-break. Known bottle/cigar names are masked
 * before matching, and keywords match whole words with their inflections
 * ("pairs", "allocations") so "repair" and "rarely" fire nothing.
 */

import { extractPostalCode } from '../places/geocoding/postal-code.js';
import { containsPhrase, findStem } from '../../utils/text-match.js';
import { maskEntityNames } from './entity-extraction.js';
import { Mode, type DialogueSession, type RouteDecision, type TaskMode } from './dialogue.types.js';

export interface TriggerRule {
  id: string;
  mode: TaskMode;
  /** Returns the matched keyword, or null */
  match: (text: string) => string | null;
}

export const PAIRING_TRIGGERS = ['pair', 'pairing', 'smoke with', 'goes with', 'match with', 'what cigar'] as const;

export const HUNT_TRIGGERS = [
  'allocation', 'allocated', 'rare', 'limited', 'drop', 'lottery', 'raffle', 'release',
  'find', 'near me', 'closest', 'in my area', 'where can i find'
] as const;

export const TRIGGER_RULES: readonly TriggerRule[] = [
  { id: 'pairing_vocabulary', mode: Mode.Pairing, match: text => findStem(text, PAIRING_TRIGGERS) },
  { id: 'hunt_vocabulary', mode: Mode.Hunt, match: text => findStem(text, HUNT_TRIGGERS) },
  { id: 'postal_code', mode: Mode.Hunt, match: text => extractPostalCode(text) },
];

export function matchTrigger(message: string): RouteDecision | null {
  // Bottle names must not fire triggers: "eagle rare" is not a rare-bottle hunt
  const text = maskEntityNames(message.toLowerCase());
  for (const rule of TRIGGER_RULES) {
    const hit = rule.match(text);
    if (hit !== null) {
      return { mode: rule.mode, reason: 'trigger', trigger: `${rule.id}:${hit}` };
    }
  }
  return null;
}

/** The lane question offers HUNT by name; pairing replies already carry pairing vocabulary */
function matchLane(message: string): RouteDecision | null {
  const triggered = matchTrigger(message);
  if (triggered) {
    return { mode: triggered.mode, reason: 'lane_selected', trigger: triggered.trigger };
  }
  if (containsPhrase(maskEntityNames(message), 'hunt')) {
    return { mode: Mode.Hunt, reason: 'lane_selected', trigger: 'lane:hunt' };
  }
  return null;
}

export function route(message: string, session: DialogueSession): RouteDecision {
  const pending = session.pendingClarification;
  if (pending) {
    if (pending.mode === Mode.Info && pending.slot === 'topic') {
      const lane = matchLane(message);
      if (lane) return lane;
    }
    return { mode: pending.mode, reason: 'pending_clarification', trigger: pending.slot };
  }

  const triggered = matchTrigger(message);
  if (triggered) return triggered;

  if (session.pairing.awaiting) {
    return { mode: Mode.Pairing, reason: 'sticky', trigger: `pairing.awaiting:${session.pairing.awaiting}` };
  }
  if (session.hunt.awaiting) {
    return { mode: Mode.Hunt, reason: 'sticky', trigger: `hunt.awaiting:${session.hunt.awaiting}` };
  }

  return { mode: Mode.Info, reason: 'default' };
}
