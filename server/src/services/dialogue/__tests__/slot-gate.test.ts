import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createSession, type DialogueSession } from '../dialogue.types.js';
import { recordEntity } from '../entity-memory.js';
import { route } from '../mode-router.js';
import { gate, type GateResult, type SlotContext } from '../slot-gate.js';

const ctx: SlotContext = { knownAreas: ['nashville'], preferredStrength: null, recentlyClarified: null };

function turn(message: string, session: DialogueSession, context: SlotContext = ctx): GateResult {
  session.turnCount += 1;
  return gate(route(message, session), message, session, context);
}

describe('gate: hunt', () => {
  it('asks for the area and records the pending clarification', () => {
    const session = createSession('user-1', 0);
    const result = turn('find rare allocations', session);

    assert.strictEqual(result.kind, 'clarify');
    if (result.kind !== 'clarify') return;
    assert.strictEqual(result.output.summary, 'I can do this, I just need your hunt area and target.');
    assert.deepStrictEqual(result.output.items.map(i => i.value), ['30344 + Weller', 'Dallas, TX + best allocation shops']);
    assert.deepStrictEqual(session.pendingClarification, { mode: 'hunt', slot: 'area', askedAtTurn: 1 });
  });

  it('takes the whole reply as the area on the next turn', () => {
    const session = createSession('user-1', 0);
    turn('find rare allocations', session);
    const result = turn('somewhere out west', session);

    assert.deepStrictEqual(result, {
      kind: 'proceed',
      slots: { mode: 'hunt', area: 'somewhere out west', target: null, category: 'spirits' }
    });
    assert.strictEqual(session.pendingClarification, null);
    assert.deepStrictEqual(session.lastClarifiedSlot, { mode: 'hunt', slot: 'area' });
  });

  it('extracts a postal code and bottle in one go', () => {
    const result = turn('hunt 30344 + Weller drops', createSession('user-1', 0));

    assert.deepStrictEqual(result, {
      kind: 'proceed',
      slots: { mode: 'hunt', area: '30344', target: { kind: 'bottle', name: 'Weller' }, category: 'spirits' }
    });
  });

  it('recognises a known area name', () => {
    const result = turn('find allocation shops in Nashville', createSession('user-1', 0));
    assert.strictEqual(result.kind === 'proceed' && result.slots.mode === 'hunt' ? result.slots.area : null, 'Nashville');
  });

  it('asks cigar hunters for their area with cigar wording', () => {
    const result = turn('find cigar shops', createSession('user-1', 0));
    assert.strictEqual(result.kind === 'clarify' ? result.output.summary : null, 'I can find cigar shops, I just need your area.');
  });
});

describe('gate: pairing', () => {
  it('asks what is being poured when there is no subject', () => {
    const session = createSession('user-1', 0);
    const result = turn('pair me something nice', session);

    assert.strictEqual(result.kind === 'clarify' ? result.output.summary : null, 'Before I pair it, what are we pouring?');
    assert.deepStrictEqual(session.pendingClarification, { mode: 'pairing', slot: 'subject', askedAtTurn: 1 });
  });

  it('asks for intensity when a spirit has no stated strength', () => {
    const result = turn('what cigar pairs with Weller', createSession('user-1', 0));
    assert.strictEqual(result.kind === 'clarify' ? result.output.summary : null, 'How strong do you want the cigar next to Weller?');
  });

  it('uses a stated strength', () => {
    const result = turn('pair a bold cigar with Weller', createSession('user-1', 0));
    assert.deepStrictEqual(result, {
      kind: 'proceed',
      slots: {
        mode: 'pairing',
        subject: { category: 'spirit', name: 'Weller', strength: 'medium' },
        intensity: 'full',
        intensityDefaulted: false,
        topic: null
      }
    });
  });

  it('fills intensity from the preferred strength', () => {
    const result = turn('what cigar pairs with bourbon', createSession('user-1', 0), { ...ctx, preferredStrength: 'mild' });
    assert.deepStrictEqual(result.kind === 'proceed' ? result.slots : null, {
      mode: 'pairing',
      subject: { category: 'spirit', name: 'Bourbon', strength: null },
      intensity: 'mild',
      intensityDefaulted: false,
      topic: null
    });
  });

  it('defaults an unreadable intensity answer instead of asking again', () => {
    const session = createSession('user-1', 0);
    turn('what cigar pairs with Weller', session);
    const result = turn('whatever you think', session);

    assert.deepStrictEqual(result.kind === 'proceed' ? result.slots : null, {
      mode: 'pairing',
      subject: { category: 'spirit', name: 'Weller', strength: 'medium' },
      intensity: 'medium',
      intensityDefaulted: true,
      topic: null
    });
    assert.strictEqual(session.pendingClarification, null);
  });

  it('does not ask for a slot that was just clarified', () => {
    const result = turn('what cigar pairs with Weller', createSession('user-1', 0), {
      ...ctx,
      recentlyClarified: { mode: 'pairing', slot: 'intensity' }
    });
    assert.strictEqual(result.kind === 'proceed' && result.slots.mode === 'pairing' ? result.slots.intensityDefaulted : null, true);
  });

  it('sizes a cigar subject by its own strength', () => {
    const result = turn('what bourbon goes with a Padron 1926', createSession('user-1', 0));
    assert.deepStrictEqual(result.kind === 'proceed' ? result.slots : null, {
      mode: 'pairing',
      subject: { category: 'cigar', name: 'Padron 1926', strength: 'full' },
      intensity: 'full',
      intensityDefaulted: false,
      topic: null
    });
  });

  it('resolves a pronoun to the last cigar and carries the topic', () => {
    const session = createSession('user-1', 0);
    recordEntity(session, 'cigar', 'Ashton', { strength: 'mild' });
    const result = turn('what bourbon pairs with it', session);

    assert.deepStrictEqual(result.kind === 'proceed' ? result.slots : null, {
      mode: 'pairing',
      subject: { category: 'cigar', name: 'Ashton', strength: 'mild' },
      intensity: 'mild',
      intensityDefaulted: false,
      topic: 'bourbon-pairing-for-Ashton'
    });
  });

  it('asks which bottle or cigar a pronoun means instead of using the requested spirit', () => {
    const session = createSession('user-1', 0);
    const result = turn('what bourbon pairs with it', session);

    assert.strictEqual(result.kind === 'clarify' ? result.output.summary : null, 'Which bottle or cigar do you mean?');
    assert.deepStrictEqual(session.pendingClarification, { mode: 'pairing', slot: 'subject', askedAtTurn: 1 });
  });
});

describe('gate: info', () => {
  it('asks for a lane on a bare greeting', () => {
    const session = createSession('user-1', 0);
    const result = turn('hey', session);

    assert.strictEqual(result.kind, 'clarify');
    if (result.kind !== 'clarify') return;
    assert.strictEqual(result.output.summary, "Tell me what lane you're in.");
    assert.deepStrictEqual(result.output.items.map(i => i.label), ['INFO', 'PAIRING', 'HUNT']);
  });

  it('proceeds with the reply to the lane question', () => {
    const session = createSession('user-1', 0);
    turn('hey', session);
    const result = turn('hi', session);

    assert.deepStrictEqual(result, { kind: 'proceed', slots: { mode: 'info', topic: 'hi', resolvedEntity: null } });
  });

  it('enters the lane a reply to the lane question picks', () => {
    const session = createSession('user-1', 0);
    turn('hey', session);
    const result = turn('what cigar pairs with Weller', session);

    assert.strictEqual(result.kind === 'clarify' ? result.output.summary : null, 'How strong do you want the cigar next to Weller?');
    assert.deepStrictEqual(session.pendingClarification, { mode: 'pairing', slot: 'intensity', askedAtTurn: 2 });
    assert.deepStrictEqual(session.lastClarifiedSlot, { mode: 'info', slot: 'topic' });
  });

  it('asks what a pronoun means when nothing has been discussed', () => {
    const session = createSession('user-1', 0);
    const result = turn('tell me about it', session);

    assert.strictEqual(result.kind === 'clarify' ? result.output.summary : null, 'Which bottle or cigar do you mean?');
    assert.deepStrictEqual(session.pendingClarification, { mode: 'info', slot: 'topic', askedAtTurn: 1 });
  });

  it('lets a named bottle stand in for the pronoun', () => {
    const result = turn('is eagle rare worth it', createSession('user-1', 0));
    assert.deepStrictEqual(result, { kind: 'proceed', slots: { mode: 'info', topic: 'is eagle rare worth it', resolvedEntity: null } });
  });

  it('passes a question through with the entity a pronoun points at', () => {
    const session = createSession('user-1', 0);
    recordEntity(session, 'spirit', 'Weller');
    const result = turn('how old is it', session);

    assert.deepStrictEqual(result, { kind: 'proceed', slots: { mode: 'info', topic: 'how old is it', resolvedEntity: 'Weller' } });
  });
});
