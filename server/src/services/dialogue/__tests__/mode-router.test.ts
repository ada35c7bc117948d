import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createSession } from '../dialogue.types.js';
import { matchTrigger, route } from '../mode-router.js';

describe('matchTrigger', () => {
  it('fires hunt vocabulary on an inflected keyword', () => {
    assert.deepStrictEqual(matchTrigger('find rare allocations'), {
      mode: 'hunt',
      reason: 'trigger',
      trigger: 'hunt_vocabulary:allocation'
    });
  });

  it('fires pairing vocabulary', () => {
    assert.deepStrictEqual(matchTrigger('What cigar pairs with Weller?'), {
      mode: 'pairing',
      reason: 'trigger',
      trigger: 'pairing_vocabulary:pair'
    });
  });

  it('sends a message with both vocabularies to pairing', () => {
    assert.strictEqual(matchTrigger('pair a cigar with my allocation haul')?.mode, 'pairing');
  });

  it('routes a bare postal code to hunt', () => {
    assert.deepStrictEqual(matchTrigger('30344'), { mode: 'hunt', reason: 'trigger', trigger: 'postal_code:30344' });
  });

  it('does not let bottle names fire triggers', () => {
    assert.strictEqual(matchTrigger('is eagle rare worth it'), null);
  });

  it('ignores keywords buried inside other words', () => {
    assert.strictEqual(matchTrigger('I rarely drink rye'), null);
    assert.strictEqual(matchTrigger('my humidor needs repair'), null);
    assert.strictEqual(matchTrigger('the eyedropper broke'), null);
  });

  it('fires on the common inflections of a keyword', () => {
    assert.strictEqual(matchTrigger('Weller drops on Friday')?.trigger, 'hunt_vocabulary:drop');
    assert.strictEqual(matchTrigger('anything paired well with a Cohiba')?.trigger, 'pairing_vocabulary:pair');
  });
});

describe('route', () => {
  it('defaults to info', () => {
    assert.deepStrictEqual(route('what is a wheated bourbon', createSession('user-1', 0)), { mode: 'info', reason: 'default' });
  });

  it('sends the reply to a pending clarification back to its mode', () => {
    const session = createSession('user-1', 0);
    session.pendingClarification = { mode: 'hunt', slot: 'area', askedAtTurn: 1 };

    assert.deepStrictEqual(route('what cigar pairs with this', session), {
      mode: 'hunt',
      reason: 'pending_clarification',
      trigger: 'area'
    });
  });

  it('sends a reply to the lane question to the lane it names', () => {
    const session = createSession('user-1', 0);
    session.pendingClarification = { mode: 'info', slot: 'topic', askedAtTurn: 1 };

    assert.deepStrictEqual(route('where can i find Weller near 30344', session), {
      mode: 'hunt',
      reason: 'lane_selected',
      trigger: 'hunt_vocabulary:find'
    });
    assert.deepStrictEqual(route('hunt', session), { mode: 'hunt', reason: 'lane_selected', trigger: 'lane:hunt' });
    assert.strictEqual(route('pairing please', session).mode, 'pairing');
  });

  it('keeps an ordinary reply to the lane question in info', () => {
    const session = createSession('user-1', 0);
    session.pendingClarification = { mode: 'info', slot: 'topic', askedAtTurn: 1 };

    assert.deepStrictEqual(route('what is a wheated bourbon', session), {
      mode: 'info',
      reason: 'pending_clarification',
      trigger: 'topic'
    });
  });

  it('honours sticky pairing before sticky hunt', () => {
    const session = createSession('user-1', 0);
    session.pairing.awaiting = 'intensity';
    session.hunt.awaiting = 'target';

    assert.deepStrictEqual(route('mild', session), {
      mode: 'pairing',
      reason: 'sticky',
      trigger: 'pairing.awaiting:intensity'
    });
  });

  it('honours sticky hunt', () => {
    const session = createSession('user-1', 0);
    session.hunt.awaiting = 'target';

    assert.deepStrictEqual(route('Weller', session), { mode: 'hunt', reason: 'sticky', trigger: 'hunt.awaiting:target' });
  });

  it('lets a trigger override sticky state', () => {
    const session = createSession('user-1', 0);
    session.pairing.awaiting = 'intensity';

    assert.strictEqual(route('find rare allocations', session).mode, 'hunt');
  });
});
