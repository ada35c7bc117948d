/**
 * Response Normalizer
 *
 * toWire: exhaustive ModeOutput -> wire conversion.
 * normalize: schema enforcement for anything else (drifted handler output,
 * stored payloads). Every field ends up present with the right collection
 * type, unknown fields are dropped, an invalid mode is backfilled from the
 * router's decision. normalize(normalize(x)) deep-equals normalize(x).
 */

import type { StoreRecord } from '../places/models/types.js';
import {
  ModeSchema,
  PairingDetailSchema,
  type LabeledItem,
  type Mode,
  type ModeOutput,
  type NormalizedResponse,
  type PairingDetail,
  type Stop
} from './dialogue.types.js';

export function emptyResponse(mode: Mode): NormalizedResponse {
  return {
    mode,
    summary: '',
    key_points: [],
    item_list: [],
    next_step: '',
    primary_pairing: null,
    alternative_pairings: [],
    stops: [],
    target_bottles: [],
    store_targets: []
  };
}

export function toStop(record: StoreRecord): Stop {
  return {
    name: record.name,
    address: record.address,
    notes: record.notes,
    ...(record.location && { lat: record.location.lat, lng: record.location.lng })
  };
}

export function toWire(output: ModeOutput): NormalizedResponse {
  const base = {
    ...emptyResponse(output.mode),
    summary: output.summary,
    key_points: [...output.keyPoints],
    item_list: output.items.map(item => ({ label: item.label, value: item.value })),
    next_step: output.nextStep
  };

  switch (output.mode) {
    case 'info':
    case 'clarify':
      return base;
    case 'pairing':
      return {
        ...base,
        primary_pairing: output.primary,
        alternative_pairings: [...output.alternatives]
      };
    case 'hunt':
      return {
        ...base,
        stops: output.stops.map(toStop),
        target_bottles: [...output.targetBottles],
        store_targets: [...output.storeTargets]
      };
    default: {
      const unreachable: never = output;
      throw new Error(`Unhandled mode output: ${JSON.stringify(unreachable)}`);
    }
  }
}

// ─── Defensive coercion ──────────────────────────────────────────────────

type Scalar = string | number | boolean;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function toText(value: unknown): string {
  if (isScalar(value)) return String(value);
  return '';
}

function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter(isScalar).map(String);
  }
  if (isScalar(value)) {
    return [String(value)];
  }
  return [];
}

function toItem(value: unknown): LabeledItem[] {
  if (isScalar(value)) {
    return [{ label: 'Note', value: String(value) }];
  }
  if (!isRecord(value)) return [];
  if ('label' in value || 'value' in value) {
    return [{ label: toText(value.label) || 'Note', value: toText(value.value) }];
  }
  // {"Proof": "107"} style objects
  return Object.entries(value)
    .filter((entry): entry is [string, Scalar] => isScalar(entry[1]))
    .map(([label, entryValue]) => ({ label: label || 'Note', value: String(entryValue) }));
}

function toItemList(value: unknown): LabeledItem[] {
  if (Array.isArray(value)) {
    return value.flatMap(toItem);
  }
  return toItem(value);
}

function toPairing(value: unknown): PairingDetail | null {
  const parsed = PairingDetailSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function toPairingList(value: unknown): PairingDetail[] {
  if (!Array.isArray(value)) return [];
  return value.map(toPairing).filter((detail): detail is PairingDetail => detail !== null);
}

function toStopEntry(value: unknown): Stop[] {
  if (!isRecord(value)) return [];
  const name = toText(value.name).trim();
  if (!name) return [];
  const stop: Stop = {
    name,
    address: toText(value.address),
    notes: toText(value.notes)
  };
  const { lat, lng } = value;
  if (typeof lat === 'number' && typeof lng === 'number' && Number.isFinite(lat) && Number.isFinite(lng)) {
    stop.lat = lat;
    stop.lng = lng;
  }
  return [stop];
}

function toStops(value: unknown): Stop[] {
  if (Array.isArray(value)) return value.flatMap(toStopEntry);
  return toStopEntry(value);
}

export function normalize(raw: unknown, fallbackMode: Mode): NormalizedResponse {
  if (!isRecord(raw)) {
    return { ...emptyResponse(fallbackMode), summary: toText(raw) };
  }

  const mode = ModeSchema.safeParse(raw.mode);

  return {
    mode: mode.success ? mode.data : fallbackMode,
    summary: toText(raw.summary),
    key_points: toStringList(raw.key_points),
    item_list: toItemList(raw.item_list),
    next_step: toText(raw.next_step),
    primary_pairing: toPairing(raw.primary_pairing),
    alternative_pairings: toPairingList(raw.alternative_pairings),
    stops: toStops(raw.stops),
    target_bottles: toStringList(raw.target_bottles),
    store_targets: toStringList(raw.store_targets)
  };
}
