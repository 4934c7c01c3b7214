import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TAX_BRACKETS,
  applyDeductions,
  calculateProgressiveTax,
  calculateSavingsRatio,
  classifySavingsBucket,
  roundCurrency,
  validateBrackets,
} from '..';

describe('budgetCalculator', () => {
  it('rounds to whole cents', () => {
    expect(roundCurrency(0.1 + 0.2)).toBe(0.3);
    expect(roundCurrency(-12.344)).toBe(-12.34);
  });

  it('computes the savings ratio and treats zero income as 0', () => {
    expect(calculateSavingsRatio(1000, 1050)).toBe(-0.05);
    expect(calculateSavingsRatio(0, 1050)).toBe(0);
  });

  it('classifies the bucket boundaries', () => {
    expect(classifySavingsBucket(-0.05)).toBe('deficit');
    expect(classifySavingsBucket(0)).toBe('low');
    expect(classifySavingsBucket(0.1)).toBe('moderate');
    expect(classifySavingsBucket(0.3)).toBe('high');
  });
});

describe('taxCalculator', () => {
  it('ships a contiguous default schedule', () => {
    expect(validateBrackets(DEFAULT_TAX_BRACKETS)).toEqual([]);
  });

  it('reports each schedule problem', () => {
    expect(
      validateBrackets([
        { lowerBound: 10, upperBound: 100, rate: 1.5 },
        { lowerBound: 90, upperBound: 200, rate: 0.2 },
      ])
    ).toEqual([
      'first bracket must start at 0',
      'bracket 0 rate 1.5 is outside [0, 1]',
      'gap or overlap between brackets 0 and 1',
      'last bracket must be unbounded',
    ]);
    expect(validateBrackets([])).toEqual(['schedule has no brackets']);
  });

  it('never lets deductions push taxable income below zero', () => {
    expect(
      applyDeductions(100, [{ description: 'Large', reduction: 500, appliesTo: () => true }])
    ).toEqual({ taxableIncome: 0, deductionsApplied: ['Large'] });
  });

  it('stops at the first bracket above the income', () => {
    const { totalTax, bracketBreakdown } = calculateProgressiveTax(10000, DEFAULT_TAX_BRACKETS);

    expect(totalTax).toBe(1001);
    expect(bracketBreakdown).toEqual([
      { lowerBound: 0, upperBound: 9950, rate: 0.1, taxableAmount: 9950, tax: 995 },
      { lowerBound: 9950, upperBound: 40525, rate: 0.12, taxableAmount: 50, tax: 6 },
    ]);
  });
});
