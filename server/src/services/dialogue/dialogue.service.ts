import { logger } from '../../lib/logger/structured-logger.js';
import type { AnswerGenerator } from '../../llm/answer-generator.js';
import type { StoreResolver } from '../places/store-resolution.service.js';
import type { PreferenceRecord, PreferenceStore } from '../preferences/preference-store.js';
import {
  Mode,
  type DialogueSession,
  type EntityCategory,
  type ModeOutput,
  type NormalizedResponse,
  type RouteDecision
} from './dialogue.types.js';
import { extractEntities } from './entity-extraction.js';
import { recordEntity } from './entity-memory.js';
import { HuntHandler } from './handlers/hunt.handler.js';
import { runInfo } from './handlers/info.handler.js';
import { runPairing } from './handlers/pairing.handler.js';
import { route } from './mode-router.js';
import { normalize, toWire } from './response-normalizer.js';
import { gate, type FilledSlots } from './slot-gate.js';
import { classifyTurnError, TURN_FAILURE_MESSAGES } from './turn-error-kinds.js';

export interface DialogueDeps {
  stores: StoreResolver;
  generateAnswer: AnswerGenerator;
  preferences: PreferenceStore;
  /** Area names recognised without a postal code, e.g. curated region aliases */
  knownAreas?: readonly string[];
}

interface Mention {
  name: string;
  category: EntityCategory;
}

/**
 * DialogueService
 * One turn: route -> gate -> handler -> normalize -> persist.
 *
 * processTurn never throws; an unexpected failure becomes an Info response
 * with a generic failure summary. Callers own session locking (see SessionStore).
 */
export class DialogueService {
  private readonly huntHandler: HuntHandler;
  private readonly knownAreas: readonly string[];

  constructor(private readonly deps: DialogueDeps) {
    this.huntHandler = new HuntHandler(deps.stores);
    this.knownAreas = deps.knownAreas ?? [];
  }

  async processTurn(userMessage: string, session: DialogueSession): Promise<NormalizedResponse> {
    const startTime = Date.now();
    const message = userMessage.trim();

    try {
      session.turnCount += 1;

      const decision = route(message, session);
      logger.info({
        event: 'route_decision',
        userId: session.userId,
        turn: session.turnCount,
        mode: decision.mode,
        reason: decision.reason,
        trigger: decision.trigger
      }, '[Dialogue] Route decided');

      // Sticky sub-state and the loop guard each last exactly one turn
      session.pairing.awaiting = null;
      session.hunt.awaiting = null;
      const recentlyClarified = session.lastClarifiedSlot;
      session.lastClarifiedSlot = null;

      const preferences = await this.loadPreferences(session.userId);
      const gated = gate(decision, message, session, {
        knownAreas: this.knownAreas,
        preferredStrength: preferences?.preferredCigarStrength ?? null,
        recentlyClarified
      });

      const mentions = this.mentionsIn(message);
      let output: ModeOutput;
      if (gated.kind === 'clarify') {
        output = gated.output;
      } else {
        output = await this.execute(gated.slots);
        this.setStickyState(session, decision, gated.slots);
        mentions.push(...this.mentionsFromOutput(output));
      }

      for (const mention of mentions) {
        recordEntity(session, mention.category, mention.name, mention.strength ? { strength: mention.strength } : {});
      }

      const response = normalize(toWire(output), decision.mode);
      session.lastMode = response.mode;

      await this.persist(session, mentions, response.mode, gated.kind === 'proceed' ? gated.slots : null);

      logger.info({
        event: 'turn_completed',
        userId: session.userId,
        turn: session.turnCount,
        mode: response.mode,
        pendingSlot: session.pendingClarification?.slot ?? null,
        stops: response.stops.length,
        durationMs: Date.now() - startTime
      }, '[Dialogue] Turn completed');

      return response;
    } catch (error) {
      const errorKind = classifyTurnError(error);
      logger.error({
        event: 'turn_failed',
        userId: session.userId,
        turn: session.turnCount,
        errorKind,
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - startTime
      }, '[Dialogue] Turn failed');

      return normalize({
        mode: Mode.Info,
        summary: TURN_FAILURE_MESSAGES[errorKind],
        next_step: 'Try that again in a moment.'
      }, Mode.Info);
    }
  }

  private async execute(slots: FilledSlots): Promise<ModeOutput> {
    switch (slots.mode) {
      case 'hunt':
        return this.huntHandler.run(slots);
      case 'pairing':
        return runPairing(slots);
      case 'info':
        return runInfo(slots, this.deps.generateAnswer);
    }
  }

  /** Only a turn that was not itself sticky may leave sticky state behind */
  private setStickyState(session: DialogueSession, decision: RouteDecision, slots: FilledSlots): void {
    if (decision.reason === 'sticky') return;
    if (slots.mode === 'pairing' && slots.intensityDefaulted) {
      session.pairing.awaiting = 'intensity';
    }
    if (slots.mode === 'hunt' && slots.target === null) {
      session.hunt.awaiting = 'target';
    }
  }

  private mentionsIn(message: string): Array<Mention & { strength?: string }> {
    return extractEntities(message).map(entity => ({ name: entity.name, category: entity.category, strength: entity.strength }));
  }

  /** The primary recommendation counts as discussed: "tell me more about it" points at it */
  private mentionsFromOutput(output: ModeOutput): Array<Mention & { strength?: string }> {
    if (output.mode === 'pairing') {
      return [{ name: output.primary.name, category: output.primary.category, strength: output.primary.strength }];
    }
    return [];
  }

  private async loadPreferences(userId: string): Promise<PreferenceRecord | null> {
    try {
      return await this.deps.preferences.getUserPreferences(userId);
    } catch (error) {
      logger.warn({ event: 'preferences_load_failed', userId, error: error instanceof Error ? error.message : String(error) },
        '[Dialogue] Could not load preferences');
      return null;
    }
  }

  private async persist(session: DialogueSession, mentions: Mention[], mode: NormalizedResponse['mode'], slots: FilledSlots | null): Promise<void> {
    const { preferences } = this.deps;
    try {
      for (const mention of mentions) {
        await preferences.recordInteraction(session.userId, mention, mode);
      }
      if (slots?.mode === 'pairing' && slots.subject.category === 'spirit' && !slots.intensityDefaulted) {
        await preferences.setPreferredCigarStrength(session.userId, slots.intensity);
      }
      const record = await preferences.getUserPreferences(session.userId);
      session.context.favoriteBourbons = [...record.favoriteBourbons];
      session.context.favoriteCigars = [...record.favoriteCigars];
    } catch (error) {
      logger.warn({ event: 'preferences_persist_failed', userId: session.userId, error: error instanceof Error ? error.message : String(error) },
        '[Dialogue] Could not persist preferences');
    }
  }
}
