import { describe, expect, it } from 'vitest';
import { InvalidQuestionError, createQuestion, fingerprintOf } from './Question.js';

describe('createQuestion', () => {
  it('fills defaults for explanation and topic', () => {
    const q = createQuestion({ text: 'Q?', options: ['a', 'b'], correctIndex: 1 });
    expect(q.explanation).toBe('');
    expect(q.topic).toBe('General');
    expect(Object.isFrozen(q)).toBe(true);
    expect(Object.isFrozen(q.options)).toBe(true);
  });

  it('rejects empty text', () => {
    expect(() => createQuestion({ text: '   ', options: ['a', 'b'], correctIndex: 0 })).toThrow(
      InvalidQuestionError
    );
  });

  it('rejects a single option', () => {
    expect(() => createQuestion({ text: 'Q?', options: ['a'], correctIndex: 0 })).toThrow(
      'Expected at least 2 options, got 1'
    );
  });

  it('rejects an out-of-range or fractional answer index', () => {
    expect(() => createQuestion({ text: 'Q?', options: ['a', 'b'], correctIndex: 2 })).toThrow(
      'correctIndex 2 is out of range'
    );
    expect(() => createQuestion({ text: 'Q?', options: ['a', 'b'], correctIndex: 0.5 })).toThrow(
      InvalidQuestionError
    );
  });
});

describe('fingerprintOf', () => {
  it('ignores surrounding whitespace and option wording', () => {
    const a = createQuestion({ text: ' Capital? ', options: ['x', 'y'], correctIndex: 1 });
    const b = createQuestion({ text: 'Capital?', options: ['p', 'q', 'r'], correctIndex: 1 });
    expect(fingerprintOf(a)).toBe(fingerprintOf(b));
  });

  it('distinguishes answer indexes', () => {
    expect(fingerprintOf({ text: 'Q', correctIndex: 0 })).not.toBe(
      fingerprintOf({ text: 'Q', correctIndex: 1 })
    );
  });
});
