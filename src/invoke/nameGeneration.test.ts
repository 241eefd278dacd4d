import { describe, it, expect } from 'vitest';

import { generateNames } from './nameGeneration.js';

describe('generateNames', () => {
  it('counts up from 0', () => {
    expect(generateNames(new Set(), 'args_', 3)).toEqual(['args_0', 'args_1', 'args_2']);
  });

  it('skips names already bound in the engine', () => {
    const bound = new Set(['args_0', 'args_2', 'x']);
    expect(generateNames(bound, 'args_', 3)).toEqual(['args_1', 'args_3', 'args_4']);
  });

  it('generates nothing for a count of 0', () => {
    expect(generateNames(new Set(['args_0']), 'args_', 0)).toEqual([]);
  });

  it('never returns a bound name', () => {
    const bound = new Set(Array.from({ length: 50 }, (_, i) => `return_${i * 2}`));
    const names = generateNames(bound, 'return_', 20);
    expect(names).toHaveLength(20);
    expect(new Set(names).size).toBe(20);
    expect(names.filter((n) => bound.has(n))).toEqual([]);
    expect(names[0]).toBe('return_1');
  });
});
