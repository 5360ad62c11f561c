import { describe, it, expect } from 'vitest';

import { VERDICTS, formatProblemCode, formatSolveCount, formatVerdict } from './index';

describe('formatVerdict', () => {
  it('should render every verdict as a human label', () => {
    expect(VERDICTS.map(formatVerdict)).toEqual([
      'Accepted',
      'Wrong Answer',
      'Runtime Error',
      'Time Limit Exceeded',
      'Memory Limit Exceeded',
      'Output Limit Exceeded',
      'Compilation Error',
      'System Error',
    ]);
  });
});

describe('formatSolveCount', () => {
  it('should pluralise', () => {
    expect(formatSolveCount(0)).toBe('0 solves');
    expect(formatSolveCount(1)).toBe('1 solve');
    expect(formatSolveCount(12)).toBe('12 solves');
  });
});

describe('formatProblemCode', () => {
  it('should join judge and problem id', () => {
    expect(formatProblemCode('CodeForces', '123A')).toBe('CodeForces-123A');
  });
});
