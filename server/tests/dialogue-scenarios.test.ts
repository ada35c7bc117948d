/**
 * End-to-end dialogue scenarios: full processTurn with every upstream faked.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { NormalizedResponseSchema, createSession } from '../src/services/dialogue/dialogue.types.js';
import { recordEntity } from '../src/services/dialogue/entity-memory.js';
import type { StoreResolver } from '../src/services/places/store-resolution.service.js';
import { DialogueService } from '../src/services/dialogue/dialogue.service.js';
import { InMemoryPreferenceStore } from '../src/services/preferences/preference-store.js';
import { FakeCuratedLookup, FakeGeocoder, FakePlaceSearch, liquorStore } from './helpers/fake-places.js';
import { failingAnswers, recordingAnswers, testRuntime } from './helpers/test-runtime.js';

const GREENS = { name: "Green's Beverages", address: '737 Ponce De Leon Ave NE', notes: 'Ask to join the list.' };
const TOWER = { name: 'Tower Beer Wine & Spirits', address: '2161 Piedmont Rd NE', notes: 'Raffle on release weeks.' };

describe('Dialogue scenarios', () => {
  it('A: asks for the area on a bare allocation hunt', async () => {
    const { dialogue } = testRuntime();
    const session = createSession('user-a');

    const response = await dialogue.processTurn('find rare allocations', session);

    assert.strictEqual(response.mode, 'clarify');
    assert.strictEqual(response.summary, 'I can do this, I just need your hunt area and target.');
    assert.deepStrictEqual(session.pendingClarification, { mode: 'hunt', slot: 'area', askedAtTurn: 1 });
  });

  it('B: a postal code satisfies the area slot', async () => {
    const { dialogue } = testRuntime();
    const session = createSession('user-b');

    const response = await dialogue.processTurn('30344 best allocation shops', session);

    assert.strictEqual(response.mode, 'hunt');
    assert.strictEqual(session.pendingClarification, null);
    assert.strictEqual(response.summary, 'Here are the best starting moves to hunt allocations near East Point, GA 30344, USA.');
    assert.deepStrictEqual(response.stops.map(s => s.name), ['Peachtree Bottle Shop']);
  });

  it('C: a pronoun in a pairing question resolves to the last cigar', async () => {
    const { dialogue } = testRuntime();
    const session = createSession('user-c');
    recordEntity(session, 'cigar', 'Padron 1926', { strength: 'full' });

    const response = await dialogue.processTurn('what bourbon pairs with it', session);

    assert.strictEqual(response.mode, 'pairing');
    assert.strictEqual(response.summary, "Here's a bourbon to pour with Padron 1926.");
    assert.deepStrictEqual(response.item_list.at(-1), { label: 'Topic', value: 'bourbon-pairing-for-Padron 1926' });
    assert.strictEqual(response.primary_pairing?.category, 'spirit');
  });

  it('D: curated and live venues merge without duplicates, curated first', async () => {
    const { dialogue } = testRuntime({
      curated: new FakeCuratedLookup({ spirits: [GREENS, TOWER] }),
      places: new FakePlaceSearch([liquorStore("  green's   BEVERAGES"), liquorStore('Peachtree Bottle Shop')])
    });

    const response = await dialogue.processTurn('find allocation shops in Atlanta, GA', createSession('user-d'));

    assert.strictEqual(response.mode, 'hunt');
    assert.deepStrictEqual(response.stops.map(s => s.name), [
      "Green's Beverages",
      'Tower Beer Wine & Spirits',
      'Peachtree Bottle Shop'
    ]);
  });

  it('E: a failing geocoder still yields a well-formed hunt response', async () => {
    const { dialogue } = testRuntime({ geocoder: new FakeGeocoder({}, true) });
    const session = createSession('user-e');

    await dialogue.processTurn('find rare allocations', session);
    const response = await dialogue.processTurn('Unknown Place', session);

    assert.doesNotThrow(() => NormalizedResponseSchema.parse(response));
    assert.strictEqual(response.mode, 'hunt');
    assert.deepStrictEqual(response.stops, [{
      name: 'Placeholder: no verified stores for Unknown Place',
      address: '',
      notes: 'Store lookup came back empty or was unavailable. Call local independents and ask how they handle allocations.'
    }]);
    assert.strictEqual(
      response.key_points.at(-1),
      'Live store search is unavailable right now and I have no curated stores for this area yet.'
    );
  });

  it('E: a failing geocoder falls back to curated stores', async () => {
    const { dialogue } = testRuntime({
      geocoder: new FakeGeocoder({}, true),
      curated: new FakeCuratedLookup({ spirits: [GREENS] })
    });
    const session = createSession('user-e2');

    await dialogue.processTurn('find rare allocations', session);
    const response = await dialogue.processTurn('Unknown Place', session);

    assert.deepStrictEqual(response.stops.map(s => s.name), ["Green's Beverages"]);
    assert.strictEqual(
      response.key_points.at(-1),
      'Live store search is unavailable right now, so these stops come from my curated list only.'
    );
  });
});

describe('Dialogue flows', () => {
  it('carries the hunt area into a sticky target follow-up', async () => {
    const { dialogue } = testRuntime();
    const session = createSession('user-f');

    await dialogue.processTurn('find rare allocations', session);
    const planned = await dialogue.processTurn('Dallas, TX', session);
    assert.strictEqual(planned.summary, 'Here are the best starting moves to hunt allocations near Dallas, TX, USA.');
    assert.strictEqual(session.hunt.awaiting, 'target');

    const targeted = await dialogue.processTurn('Weller', session);
    assert.strictEqual(targeted.mode, 'hunt');
    assert.strictEqual(targeted.summary, "Here's how to hunt Weller in Dallas, TX, USA.");
    assert.deepStrictEqual(targeted.target_bottles, ['Weller']);
    assert.strictEqual(session.hunt.awaiting, null);
  });

  it('pairs after the intensity answer and remembers the strength', async () => {
    const { dialogue, preferences } = testRuntime();
    const session = createSession('user-g');

    const question = await dialogue.processTurn('what cigar pairs with Weller', session);
    assert.strictEqual(question.summary, 'How strong do you want the cigar next to Weller?');

    const paired = await dialogue.processTurn('full', session);
    assert.strictEqual(paired.mode, 'pairing');
    assert.strictEqual(paired.primary_pairing?.name, 'Padron 1926');
    assert.strictEqual((await preferences.getUserPreferences('user-g')).preferredCigarStrength, 'full');

    const next = await dialogue.processTurn('what cigar pairs with Stagg', session);
    assert.strictEqual(next.mode, 'pairing');
    assert.strictEqual(next.primary_pairing?.name, 'Padron 1926');
  });

  it('defaults an unreadable answer and lets the next message adjust it', async () => {
    const { dialogue } = testRuntime();
    const session = createSession('user-h');

    await dialogue.processTurn('what cigar pairs with Weller', session);
    const defaulted = await dialogue.processTurn('dunno', session);
    assert.strictEqual(defaulted.mode, 'pairing');
    assert.strictEqual(defaulted.primary_pairing?.name, 'Padron 2000');
    assert.strictEqual(session.pairing.awaiting, 'intensity');

    const adjusted = await dialogue.processTurn('mild', session);
    assert.strictEqual(adjusted.mode, 'pairing');
    assert.strictEqual(adjusted.primary_pairing?.name, 'Macanudo Cafe');
    assert.strictEqual(session.pairing.awaiting, null);
  });

  it('answers an info question about the bottle a pronoun points at', async () => {
    const answers = recordingAnswers('Weller is a wheated bourbon from Buffalo Trace.');
    const { dialogue } = testRuntime({ generateAnswer: answers });
    const session = createSession('user-i');
    recordEntity(session, 'spirit', 'Weller');

    const response = await dialogue.processTurn('how old is it', session);

    assert.strictEqual(response.mode, 'info');
    assert.strictEqual(response.summary, 'Weller is a wheated bourbon from Buffalo Trace.');
    assert.deepStrictEqual(answers.prompts, ['Question: how old is it\n"It" in the question refers to: Weller']);
    assert.deepStrictEqual(response.item_list.map(i => i.label), ['MSRP', 'Secondary (low)', 'Secondary (high)']);
  });

  it('apologises when no answer can be generated', async () => {
    const { dialogue } = testRuntime({ generateAnswer: failingAnswers });

    const response = await dialogue.processTurn('what is a wheated bourbon', createSession('user-j'));

    assert.strictEqual(response.mode, 'info');
    assert.strictEqual(response.summary, "Sorry, I couldn't put an answer together right now.");
    assert.deepStrictEqual(response.item_list, []);
  });

  it('turns an unexpected failure into an info response', async () => {
    const brokenStores: StoreResolver = {
      resolveStores: async () => {
        throw new Error('boom');
      }
    };
    const dialogue = new DialogueService({
      stores: brokenStores,
      generateAnswer: recordingAnswers(),
      preferences: new InMemoryPreferenceStore()
    });

    const response = await dialogue.processTurn('30344 best allocation shops', createSession('user-k'));

    assert.strictEqual(response.mode, 'info');
    assert.strictEqual(response.summary, 'Something went wrong on my side handling that message.');
    assert.strictEqual(response.next_step, 'Try that again in a moment.');
  });

  it('takes the hunt lane when a greeting is followed by a hunt request', async () => {
    const { dialogue } = testRuntime();
    const session = createSession('user-m');

    const lanes = await dialogue.processTurn('hey', session);
    assert.strictEqual(lanes.mode, 'clarify');
    assert.strictEqual(lanes.summary, "Tell me what lane you're in.");

    const response = await dialogue.processTurn('where can i find Weller near 30344', session);
    assert.strictEqual(response.mode, 'hunt');
    assert.strictEqual(response.summary, "Here's how to hunt Weller in East Point, GA 30344, USA.");
    assert.deepStrictEqual(response.stops.map(s => s.name), ['Peachtree Bottle Shop']);
    assert.strictEqual(session.pendingClarification, null);
  });

  it('asks for the hunt area after the hunt lane is picked without one', async () => {
    const { dialogue } = testRuntime();
    const session = createSession('user-n');

    await dialogue.processTurn('hello', session);
    const response = await dialogue.processTurn('help me hunt some allocations', session);

    assert.strictEqual(response.mode, 'clarify');
    assert.strictEqual(response.summary, 'I can do this, I just need your hunt area and target.');
    assert.deepStrictEqual(session.pendingClarification, { mode: 'hunt', slot: 'area', askedAtTurn: 2 });
  });

  it('answers a plain reply to the lane question as info', async () => {
    const answers = recordingAnswers();
    const { dialogue } = testRuntime({ generateAnswer: answers });
    const session = createSession('user-o');

    await dialogue.processTurn('hi', session);
    const response = await dialogue.processTurn('what is a wheated bourbon', session);

    assert.strictEqual(response.mode, 'info');
    assert.deepStrictEqual(answers.prompts, ['Question: what is a wheated bourbon']);
  });

  it('asks what a pairing pronoun means when nothing has been discussed', async () => {
    const { dialogue } = testRuntime();
    const session = createSession('user-p');

    const question = await dialogue.processTurn('what bourbon pairs with it', session);
    assert.strictEqual(question.mode, 'clarify');
    assert.strictEqual(question.summary, 'Which bottle or cigar do you mean?');
    assert.deepStrictEqual(session.pendingClarification, { mode: 'pairing', slot: 'subject', askedAtTurn: 1 });

    const paired = await dialogue.processTurn('Padron 1926', session);
    assert.strictEqual(paired.mode, 'pairing');
    assert.strictEqual(paired.summary, "Here's a bourbon to pour with Padron 1926.");
    assert.strictEqual(paired.primary_pairing?.category, 'spirit');
  });

  it('asks what an info pronoun means instead of sending it to the answer generator', async () => {
    const answers = recordingAnswers();
    const { dialogue } = testRuntime({ generateAnswer: answers });
    const session = createSession('user-q');

    const question = await dialogue.processTurn('tell me about it', session);
    assert.strictEqual(question.mode, 'clarify');
    assert.strictEqual(question.summary, 'Which bottle or cigar do you mean?');
    assert.deepStrictEqual(answers.prompts, []);

    const answered = await dialogue.processTurn('Eagle Rare', session);
    assert.strictEqual(answered.mode, 'info');
    assert.deepStrictEqual(answers.prompts, ['Question: Eagle Rare']);
  });

  it('promotes a bottle mentioned three times to a favourite', async () => {
    const { dialogue } = testRuntime();
    const session = createSession('user-l');

    for (let i = 0; i < 3; i++) {
      await dialogue.processTurn('hunt Weller in 30344', session);
    }

    assert.deepStrictEqual(session.context.favoriteBourbons, ['Weller']);
  });
});
