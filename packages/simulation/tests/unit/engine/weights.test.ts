import { describe, it, expect } from 'vitest';
import { sanitizeTargetWeights } from '../../../src/engine/weights.js';

const T = Date.UTC(2024, 2, 4);

describe('sanitizeTargetWeights', () => {
  it('should pass valid weights through untouched', () => {
    const { weights, warnings } = sanitizeTargetWeights(new Map([['AAA', 0.5], ['BBB', 0.5]]), T);

    expect([...weights]).toEqual([['AAA', 0.5], ['BBB', 0.5]]);
    expect(warnings).toEqual([]);
  });

  it('should clamp negative, non-finite and oversized weights one by one', () => {
    const { weights, warnings } = sanitizeTargetWeights(
      new Map([['NEG', -0.2], ['NAN', Number.NaN], ['BIG', 1.5]]),
      T
    );

    expect([...weights]).toEqual([['NEG', 0], ['NAN', 0], ['BIG', 1]]);
    expect(warnings.map((w) => [w.code, w.symbol])).toEqual([
      ['weight-clamped', 'NEG'],
      ['weight-clamped', 'NAN'],
      ['weight-clamped', 'BIG'],
    ]);
  });

  it('should report but not renormalize a total above one', () => {
    const { weights, warnings } = sanitizeTargetWeights(new Map([['AAA', 0.6], ['BBB', 0.6]]), T);

    expect(weights.get('AAA')).toBe(0.6);
    expect(warnings).toEqual([
      {
        timestamp: T,
        code: 'weights-exceed-one',
        message: 'Target weights sum to 1.2; buys are limited by available cash',
      },
    ]);
  });

  it('should tolerate rounding noise in a total of one', () => {
    const third = 1 / 3;
    const { warnings } = sanitizeTargetWeights(new Map([['A', third], ['B', third], ['C', third]]), T);

    expect(warnings).toEqual([]);
  });
});
