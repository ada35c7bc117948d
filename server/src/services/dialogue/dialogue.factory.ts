/**
 * Wires the dialogue core to its collaborators from AppConfig.
 * Tests pass overrides to swap upstream clients for in-process fakes.
 */

import type { AppConfig } from '../../config/env.js';
import { createAnswerGenerator, type AnswerGenerator } from '../../llm/answer-generator.js';
import { createLLMProvider } from '../../llm/factory.js';
import { RetryPolicy } from '../../lib/reliability/retry-policy.js';
import { GeocodeCache } from '../places/cache/geocode-cache.js';
import { GooglePlacesClient, type PlaceSearchClient } from '../places/client/google-places.client.js';
import { PlacesConfig, type PlacesSettings } from '../places/config/places.config.js';
import { StaticCuratedStoreLookup, type CuratedStoreLookup } from '../places/curated/curated-stores.js';
import { GoogleGeocoder, type Geocoder } from '../places/geocoding/geocoding.service.js';
import { StoreResolutionService } from '../places/store-resolution.service.js';
import { InMemoryPreferenceStore, type PreferenceStore } from '../preferences/preference-store.js';
import { DialogueService } from './dialogue.service.js';
import { SessionStore } from './session-store.js';

export interface DialogueRuntime {
  dialogue: DialogueService;
  sessions: SessionStore;
  preferences: PreferenceStore;
}

export interface DialogueOverrides {
  geocoder?: Geocoder;
  places?: PlaceSearchClient;
  curated?: CuratedStoreLookup;
  generateAnswer?: AnswerGenerator;
  preferences?: PreferenceStore;
  sessions?: SessionStore;
  knownAreas?: readonly string[];
  placesSettings?: PlacesSettings;
}

export function createDialogueRuntime(config: AppConfig, overrides: DialogueOverrides = {}): DialogueRuntime {
  const settings = overrides.placesSettings ?? PlacesConfig;
  const retryPolicy = new RetryPolicy({
    maxAttempts: settings.retry.attempts,
    backoffMs: settings.retry.backoffMs,
    timeoutMs: settings.timeoutMs
  });

  const staticCurated = new StaticCuratedStoreLookup();
  const curated = overrides.curated ?? staticCurated;
  const geocoder = overrides.geocoder ?? new GoogleGeocoder({
    apiKey: config.googleApiKey,
    countryCode: config.geocodeCountry,
    retryPolicy,
    cache: new GeocodeCache(settings.geocodeCacheTtlMs)
  });
  const places = overrides.places ?? new GooglePlacesClient({ apiKey: config.googleApiKey, retryPolicy });

  const generateAnswer = overrides.generateAnswer
    ?? createAnswerGenerator(createLLMProvider(config), config.llmTimeoutMs);
  const preferences = overrides.preferences ?? new InMemoryPreferenceStore();
  const sessions = overrides.sessions ?? new SessionStore({ ttlMs: config.sessionTtlMs });

  const dialogue = new DialogueService({
    stores: new StoreResolutionService({ curated, geocoder, places, settings }),
    generateAnswer,
    preferences,
    knownAreas: overrides.knownAreas ?? staticCurated.knownAreas()
  });

  return { dialogue, sessions, preferences };
}
