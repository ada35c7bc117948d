/**
 * Slot-Filling Engine
 *
 * Required slots per mode:
 *   hunt    -> area (target optional)
 *   pairing -> subject; intensity only when the subject is a spirit
 *   info    -> topic (a bare greeting does not count)
 *
 * Fresh turn: fill from the message, session sub-state, entity memory and
 * preferences; the first missing slot becomes a Clarify response and a pending
 * clarification on the session.
 *
 * Answer turn (pending clarification): the whole reply is the value of the
 * outstanding slot, pending is cleared, and the turn always proceeds; any
 * other gap is defaulted instead of asked.
 *
 * Lane selection: a reply to the lane question that the router sent to Hunt
 * or Pairing clears the question and enters that mode as a fresh turn.
 *
 * A pronoun with nothing in Entity Memory to point at is asked about, never
 * guessed from the rest of the message.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { StoreCategory } from '../places/models/types.js';
import { titleCase } from '../../utils/text-match.js';
import {
  extractArea,
  extractEntities,
  extractGenericSpirit,
  extractHuntIntent,
  extractIntensity,
  isGreeting
} from './entity-extraction.js';
import { hasPronoun, resolvePronoun } from './entity-memory.js';
import {
  Mode,
  type ClarifyOutput,
  type DialogueSession,
  type HuntTarget,
  type Intensity,
  type PairingSubject,
  type RouteDecision,
  type SlotName,
  type TaskMode
} from './dialogue.types.js';

export interface SlotContext {
  /** Area names the extractor recognises without a postal code or state */
  knownAreas: readonly string[];
  /** From the preference store; may satisfy the intensity slot */
  preferredStrength: Intensity | null;
  /** Slot answered on the previous turn; defaulted rather than asked again */
  recentlyClarified: { mode: TaskMode; slot: SlotName } | null;
}

export interface HuntSlots {
  mode: 'hunt';
  area: string;
  target: HuntTarget | null;
  category: StoreCategory;
}

export interface PairingSlots {
  mode: 'pairing';
  subject: PairingSubject;
  intensity: Intensity;
  intensityDefaulted: boolean;
  /** e.g. "bourbon-pairing-for-Padron 1926" when the subject came from a pronoun */
  topic: string | null;
}

export interface InfoSlots {
  mode: 'info';
  topic: string;
  /** Entity a pronoun in the question resolved to */
  resolvedEntity: string | null;
}

export type FilledSlots = HuntSlots | PairingSlots | InfoSlots;

export type GateResult =
  | { kind: 'proceed'; slots: FilledSlots }
  | { kind: 'clarify'; output: ClarifyOutput };

const DEFAULT_INTENSITY: Intensity = 'medium';

export function gate(decision: RouteDecision, message: string, session: DialogueSession, ctx: SlotContext): GateResult {
  const answering = decision.reason === 'pending_clarification' ? session.pendingClarification : null;
  if (answering) {
    session.pendingClarification = null;
    session.lastClarifiedSlot = { mode: answering.mode, slot: answering.slot };
    logger.info({
      event: 'clarification_answered',
      mode: answering.mode,
      slot: answering.slot,
      turnsSinceAsked: session.turnCount - answering.askedAtTurn
    }, '[SlotGate] Clarification answered');
  }
  if (decision.reason === 'lane_selected' && session.pendingClarification) {
    const lane = session.pendingClarification;
    session.pendingClarification = null;
    session.lastClarifiedSlot = { mode: lane.mode, slot: lane.slot };
    logger.info({
      event: 'lane_selected',
      mode: decision.mode,
      trigger: decision.trigger,
      turnsSinceAsked: session.turnCount - lane.askedAtTurn
    }, '[SlotGate] Lane selected');
  }
  const answerSlot = answering?.slot ?? null;

  switch (decision.mode) {
    case Mode.Hunt:
      return gateHunt(decision, message, session, ctx, answerSlot);
    case Mode.Pairing:
      return gatePairing(decision, message, session, ctx, answerSlot);
    case Mode.Info:
      return gateInfo(message, session, ctx, answerSlot);
  }
}

function isRecentlyClarified(ctx: SlotContext, mode: TaskMode, slot: SlotName): boolean {
  return ctx.recentlyClarified?.mode === mode && ctx.recentlyClarified.slot === slot;
}

function clarify(session: DialogueSession, output: ClarifyOutput): GateResult {
  session.pendingClarification = { mode: output.forMode, slot: output.slot, askedAtTurn: session.turnCount };
  logger.info({ event: 'clarification_issued', mode: output.forMode, slot: output.slot }, '[SlotGate] Clarification issued');
  return { kind: 'clarify', output };
}

// ─── Hunt ────────────────────────────────────────────────────────────────

function gateHunt(
  decision: RouteDecision,
  message: string,
  session: DialogueSession,
  ctx: SlotContext,
  answerSlot: SlotName | null
): GateResult {
  const intent = extractHuntIntent(message);
  const continuing = answerSlot !== null || decision.reason === 'sticky';

  const target = intent.target ?? (continuing ? session.hunt.target : null);
  const category = intent.category ?? (continuing ? session.hunt.category : 'spirits');
  session.hunt.target = target;
  session.hunt.category = category;

  let area = extractArea(message, ctx.knownAreas);
  if (!area && answerSlot === 'area') {
    area = message.trim() || 'your area';
  }
  area = area ?? session.hunt.area;

  if (!area) {
    return clarify(session, huntAreaQuestion(category));
  }

  session.hunt.area = area;
  session.context.area = area;
  return { kind: 'proceed', slots: { mode: 'hunt', area, target, category } };
}

function huntAreaQuestion(category: StoreCategory): ClarifyOutput {
  if (category === 'cigars') {
    return {
      mode: 'clarify',
      forMode: 'hunt',
      slot: 'area',
      summary: 'I can find cigar shops, I just need your area.',
      keyPoints: ['Send your ZIP or city/state.'],
      items: [
        { label: 'Example A', value: '19103' },
        { label: 'Example B', value: 'Chicago, IL' }
      ],
      nextStep: 'Reply with your ZIP or city/state.'
    };
  }
  return {
    mode: 'clarify',
    forMode: 'hunt',
    slot: 'area',
    summary: 'I can do this, I just need your hunt area and target.',
    keyPoints: [
      'Send your ZIP or city/state.',
      'Tell me if you want a specific bottle or just the best allocation shops.'
    ],
    items: [
      { label: 'Example A', value: '30344 + Weller' },
      { label: 'Example B', value: 'Dallas, TX + best allocation shops' }
    ],
    nextStep: "Reply with ZIP/city and either a bottle name or 'best allocation shops'."
  };
}

// ─── Pairing ─────────────────────────────────────────────────────────────

interface SubjectFill {
  subject: PairingSubject;
  topic: string | null;
}

function subjectFromMessage(message: string, session: DialogueSession): SubjectFill | null {
  const [named] = extractEntities(message);
  if (named) {
    return { subject: { category: named.category, name: named.name, strength: named.strength }, topic: null };
  }

  // "what bourbon pairs with it": the pronoun names the subject, "bourbon" is what is asked for
  const resolution = resolvePronoun(message, session);
  if (resolution) {
    const entity = session.entities[resolution.category];
    const strength = entity?.attributes.strength;
    return {
      subject: {
        category: resolution.category,
        name: resolution.entityName,
        strength: strength === 'mild' || strength === 'medium' || strength === 'full' ? strength : null
      },
      topic: resolution.topic
    };
  }
  if (hasPronoun(message)) return null;

  const generic = extractGenericSpirit(message);
  if (generic) {
    return { subject: { category: 'spirit', name: titleCase(generic), strength: null }, topic: null };
  }
  return null;
}

function gatePairing(
  decision: RouteDecision,
  message: string,
  session: DialogueSession,
  ctx: SlotContext,
  answerSlot: SlotName | null
): GateResult {
  const continuing = answerSlot !== null || decision.reason === 'sticky';
  let fill = subjectFromMessage(message, session);

  if (!fill && (continuing || isRecentlyClarified(ctx, Mode.Pairing, 'subject')) && session.pairing.subject) {
    fill = { subject: session.pairing.subject, topic: null };
  }
  if (!fill && answerSlot !== null) {
    // A subject reply names what is being poured; answer turns never ask again
    const name = answerSlot === 'subject' ? message.trim() : '';
    fill = { subject: { category: 'spirit', name: name || 'Bourbon', strength: null }, topic: null };
  }

  if (!fill) {
    return clarify(session, hasPronoun(message) ? referentQuestion(Mode.Pairing) : pairingSubjectQuestion());
  }
  session.pairing.subject = fill.subject;

  const stated = extractIntensity(message);
  if (fill.subject.category === 'cigar') {
    const intensity = fill.subject.strength ?? stated ?? DEFAULT_INTENSITY;
    session.pairing.intensity = intensity;
    return {
      kind: 'proceed',
      slots: { mode: 'pairing', subject: fill.subject, intensity, intensityDefaulted: false, topic: fill.topic }
    };
  }

  const carried = continuing ? session.pairing.intensity : null;
  const intensity = stated ?? carried ?? ctx.preferredStrength;
  if (intensity) {
    session.pairing.intensity = intensity;
    return {
      kind: 'proceed',
      slots: { mode: 'pairing', subject: fill.subject, intensity, intensityDefaulted: false, topic: fill.topic }
    };
  }

  if (answerSlot === null && !isRecentlyClarified(ctx, Mode.Pairing, 'intensity')) {
    return clarify(session, pairingIntensityQuestion(fill.subject.name));
  }

  session.pairing.intensity = null;
  return {
    kind: 'proceed',
    slots: { mode: 'pairing', subject: fill.subject, intensity: DEFAULT_INTENSITY, intensityDefaulted: true, topic: fill.topic }
  };
}

function pairingSubjectQuestion(): ClarifyOutput {
  return {
    mode: 'clarify',
    forMode: 'pairing',
    slot: 'subject',
    summary: 'Before I pair it, what are we pouring?',
    keyPoints: ['Tell me the spirit type or the exact bottle.'],
    items: [
      { label: 'Example', value: 'Pair a cigar with bourbon (medium).' },
      { label: 'Example', value: 'Pair a cigar with Eagle Rare (mild).' }
    ],
    nextStep: 'Reply with the spirit type or bottle name.'
  };
}

function referentQuestion(forMode: 'pairing' | 'info'): ClarifyOutput {
  return {
    mode: 'clarify',
    forMode,
    slot: forMode === 'pairing' ? 'subject' : 'topic',
    summary: 'Which bottle or cigar do you mean?',
    keyPoints: ["I don't have a bottle or cigar from earlier in this chat to point that at."],
    items: [
      { label: 'Example', value: 'Padron 1926' },
      { label: 'Example', value: 'Eagle Rare' }
    ],
    nextStep: 'Reply with the bottle or cigar name.'
  };
}

function pairingIntensityQuestion(subjectName: string): ClarifyOutput {
  return {
    mode: 'clarify',
    forMode: 'pairing',
    slot: 'intensity',
    summary: `How strong do you want the cigar next to ${subjectName}?`,
    keyPoints: ['Pick a body: mild, medium or full.'],
    items: [
      { label: 'Mild', value: 'Connecticut wrappers, creamy and easy' },
      { label: 'Medium', value: 'Habano or Corojo wrappers, balanced spice' },
      { label: 'Full', value: 'Maduro or Ligero, heavy and dark' }
    ],
    nextStep: 'Reply with mild, medium or full.'
  };
}

// ─── Info ────────────────────────────────────────────────────────────────

function gateInfo(message: string, session: DialogueSession, ctx: SlotContext, answerSlot: SlotName | null): GateResult {
  const trimmed = message.trim();
  const resolution = resolvePronoun(trimmed, session);
  const resolvedEntity = resolution?.entityName ?? null;
  const proceed: GateResult = { kind: 'proceed', slots: { mode: 'info', topic: trimmed || 'bourbon basics', resolvedEntity } };

  if (answerSlot === 'topic' || isRecentlyClarified(ctx, Mode.Info, 'topic')) {
    return proceed;
  }
  // "tell me about it" with nothing discussed yet
  if (!resolution && hasPronoun(trimmed) && extractEntities(trimmed).length === 0) {
    return clarify(session, referentQuestion(Mode.Info));
  }
  if (!isGreeting(trimmed)) {
    return proceed;
  }

  return clarify(session, {
    mode: 'clarify',
    forMode: 'info',
    slot: 'topic',
    summary: "Tell me what lane you're in.",
    keyPoints: [],
    items: [
      { label: 'INFO', value: 'Ask about proof, notes, price, or comparisons.' },
      { label: 'PAIRING', value: 'Ask what cigar pairs with a bottle/spirit.' },
      { label: 'HUNT', value: 'Ask where to find allocated bottles or best shops.' }
    ],
    nextStep: 'Reply with your question in one sentence.'
  });
}
