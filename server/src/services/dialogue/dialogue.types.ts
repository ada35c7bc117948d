/**
 * Dialogue Types
 *
 * Session state, routing decisions and the mode outputs that every turn is
 * reduced to before it is converted into the wire response.
 */

import { z } from 'zod';
import type { StoreCategory, StoreRecord } from '../places/models/types.js';

export const Mode = {
  Info: 'info',
  Pairing: 'pairing',
  Hunt: 'hunt',
  Clarify: 'clarify'
} as const;

export type Mode = (typeof Mode)[keyof typeof Mode];

/** Modes that run a handler; Clarify is only ever produced by the slot gate */
export type TaskMode = Exclude<Mode, 'clarify'>;

export type EntityCategory = 'spirit' | 'cigar';

export type Intensity = 'mild' | 'medium' | 'full';

export type SlotName = 'area' | 'subject' | 'intensity' | 'topic';

export interface EntityRecord {
  name: string;
  category: EntityCategory;
  attributes: Record<string, string>;
  /** Monotonic per session; higher = discussed more recently */
  seq: number;
}

export interface PendingClarification {
  mode: TaskMode;
  slot: SlotName;
  askedAtTurn: number;
}

export type HuntTarget =
  | { kind: 'bottle'; name: string }
  | { kind: 'best_shops' };

export interface HuntState {
  area: string | null;
  target: HuntTarget | null;
  category: StoreCategory;
  /** Set when the last hunt ran without a target; honoured for one turn */
  awaiting: 'target' | null;
}

export interface PairingSubject {
  category: EntityCategory;
  name: string;
  strength: Intensity | null;
}

export interface PairingState {
  subject: PairingSubject | null;
  intensity: Intensity | null;
  /** Set when the intensity had to be defaulted; honoured for one turn */
  awaiting: 'intensity' | null;
}

export interface DialogueSession {
  userId: string;
  context: Record<string, string | string[]>;
  entities: Partial<Record<EntityCategory, EntityRecord>>;
  pendingClarification: PendingClarification | null;
  /** Slot answered on the previous clarification turn; never asked again right after */
  lastClarifiedSlot: { mode: TaskMode; slot: SlotName } | null;
  hunt: HuntState;
  pairing: PairingState;
  turnCount: number;
  entitySeq: number;
  lastMode: Mode | null;
  createdAt: number;
  updatedAt: number;
}

export function createSession(userId: string, now: number = Date.now()): DialogueSession {
  return {
    userId,
    context: {},
    entities: {},
    pendingClarification: null,
    lastClarifiedSlot: null,
    hunt: { area: null, target: null, category: 'spirits', awaiting: null },
    pairing: { subject: null, intensity: null, awaiting: null },
    turnCount: 0,
    entitySeq: 0,
    lastMode: null,
    createdAt: now,
    updatedAt: now
  };
}

export type RouteReason = 'pending_clarification' | 'lane_selected' | 'trigger' | 'sticky' | 'default';

export interface RouteDecision {
  mode: TaskMode;
  reason: RouteReason;
  /** Keyword or rule id that fired, for logging */
  trigger?: string;
}

// ─── Mode outputs ─────────────────────────────────────────────────────────

export interface LabeledItem {
  label: string;
  value: string;
}

export interface PairingDetail {
  name: string;
  category: EntityCategory;
  strength: Intensity;
  why: string[];
  pour: string | null;
  quality_tag: string | null;
}

interface OutputBase {
  summary: string;
  keyPoints: string[];
  items: LabeledItem[];
  nextStep: string;
}

export interface InfoOutput extends OutputBase {
  mode: 'info';
}

export interface PairingOutput extends OutputBase {
  mode: 'pairing';
  primary: PairingDetail;
  alternatives: PairingDetail[];
}

export interface HuntOutput extends OutputBase {
  mode: 'hunt';
  stops: StoreRecord[];
  targetBottles: string[];
  storeTargets: string[];
}

export interface ClarifyOutput extends OutputBase {
  mode: 'clarify';
  forMode: TaskMode;
  slot: SlotName;
}

export type ModeOutput = InfoOutput | PairingOutput | HuntOutput | ClarifyOutput;

// ─── Wire contract ────────────────────────────────────────────────────────

export const ModeSchema = z.enum(['info', 'pairing', 'hunt', 'clarify']);

export const LabeledItemSchema = z.object({
  label: z.string(),
  value: z.string()
});

export const PairingDetailSchema = z.object({
  name: z.string(),
  category: z.enum(['spirit', 'cigar']),
  strength: z.enum(['mild', 'medium', 'full']),
  why: z.array(z.string()),
  pour: z.string().nullable(),
  quality_tag: z.string().nullable()
});

export const StopSchema = z.object({
  name: z.string(),
  address: z.string(),
  notes: z.string(),
  lat: z.number().optional(),
  lng: z.number().optional()
});

export const NormalizedResponseSchema = z.object({
  mode: ModeSchema,
  summary: z.string(),
  key_points: z.array(z.string()),
  item_list: z.array(LabeledItemSchema),
  next_step: z.string(),
  primary_pairing: PairingDetailSchema.nullable(),
  alternative_pairings: z.array(PairingDetailSchema),
  stops: z.array(StopSchema),
  target_bottles: z.array(z.string()),
  store_targets: z.array(z.string())
}).strict();

export type Stop = z.infer<typeof StopSchema>;
export type NormalizedResponse = z.infer<typeof NormalizedResponseSchema>;
