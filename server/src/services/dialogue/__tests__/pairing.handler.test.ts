import { describe, it } from 'node:test';
import assert from 'node:assert';
import { runPairing } from '../handlers/pairing.handler.js';

describe('runPairing', () => {
  it('pairs a cigar with a spirit at the requested strength', () => {
    const output = runPairing({
      mode: 'pairing',
      subject: { category: 'spirit', name: 'Weller', strength: 'medium' },
      intensity: 'medium',
      intensityDefaulted: false,
      topic: null
    });

    assert.strictEqual(output.summary, "Here's a cigar pairing that works with Weller.");
    assert.deepStrictEqual(output.primary, {
      name: 'Padron 2000',
      category: 'cigar',
      strength: 'medium',
      why: ['Natural wrapper sits at the same weight as Weller', 'Earthy sweetness complements oak and caramel notes'],
      pour: 'Neat',
      quality_tag: 'Top Shelf'
    });
    assert.deepStrictEqual(output.alternatives.map(a => [a.name, a.quality_tag]), [
      ['Arturo Fuente Hemingway', null],
      ['Romeo y Julieta Reserva Real', null]
    ]);
    assert.deepStrictEqual(output.items, [
      { label: 'Subject', value: 'Weller' },
      { label: 'Strength', value: 'Medium' }
    ]);
    assert.strictEqual(output.nextStep, 'Try it once, then tell me if you want it richer or smoother.');
  });

  it('says when the strength was assumed', () => {
    const output = runPairing({
      mode: 'pairing',
      subject: { category: 'spirit', name: 'Bourbon', strength: null },
      intensity: 'medium',
      intensityDefaulted: true,
      topic: null
    });

    assert.strictEqual(output.keyPoints.at(-1), 'I assumed a medium-bodied cigar. Tell me mild, medium or full to adjust.');
    assert.strictEqual(output.nextStep, 'Reply with mild, medium or full and I will re-pair it.');
  });

  it('pours a bourbon for a cigar and keeps the pronoun topic', () => {
    const output = runPairing({
      mode: 'pairing',
      subject: { category: 'cigar', name: 'Padron 1926', strength: 'full' },
      intensity: 'full',
      intensityDefaulted: false,
      topic: 'bourbon-pairing-for-Padron 1926'
    });

    assert.strictEqual(output.summary, "Here's a bourbon to pour with Padron 1926.");
    assert.strictEqual(output.primary.name, "Booker's");
    assert.strictEqual(output.primary.category, 'spirit');
    assert.strictEqual(output.primary.pour, 'Neat, with a splash of water');
    assert.deepStrictEqual(output.items.at(-1), { label: 'Topic', value: 'bourbon-pairing-for-Padron 1926' });
  });
});
