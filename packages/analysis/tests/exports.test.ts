import { describe, it, expect } from 'vitest';
import * as analysis from '../src/index.js';

describe('@reshape/analysis exports', () => {
  it('should not export helpers no pass uses', () => {
    const names = Object.keys(analysis);
    expect(names).not.toContain('isCall');
    expect(names).not.toContain('shapeOfValue');
    expect(names).toEqual(expect.arrayContaining(['isPure', 'usageShape', 'UsageIndex']));
  });
});
