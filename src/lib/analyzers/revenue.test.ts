import { describe, expect, it } from 'vitest';
import { estimateRevenueLoss } from './revenue';

describe('estimateRevenueLoss', () => {
  const base = { monthlySearchVolume: 1000, averageOrderValue: 25 };

  it('reports no loss for a top-3 listing', () => {
    const result = estimateRevenueLoss({ ...base, rankBucket: 'top3' });

    expect(result.idealCustomers).toBe(30);
    expect(result.lostCustomers).toBe(0);
    expect(result.monthlyLoss).toBe(0);
    expect(result.annualLoss).toBe(0);
  });

  it('keeps 40% of the customer flow at positions 4-10', () => {
    const result = estimateRevenueLoss({ ...base, rankBucket: '4-10' });

    expect(result.currentCustomers).toBe(12);
    expect(result.lostCustomers).toBe(18);
    expect(result.monthlyLoss).toBe(450);
    expect(result.annualLoss).toBe(5400);
  });

  it('keeps 10% of the customer flow outside the top 10', () => {
    const result = estimateRevenueLoss({ ...base, rankBucket: 'none' });

    expect(result.lostCustomers).toBe(27);
    expect(result.monthlyLoss).toBe(675);
    expect(result.annualLoss).toBe(8100);
  });

  it('grows the loss as the rank gets worse', () => {
    const losses = (['top3', '4-10', 'none'] as const).map(
      rankBucket => estimateRevenueLoss({ ...base, rankBucket }).monthlyLoss
    );

    expect(losses[0]).toBeLessThan(losses[1]);
    expect(losses[1]).toBeLessThan(losses[2]);
  });

  it('uses custom click-through and conversion rates', () => {
    const result = estimateRevenueLoss({ ...base, rankBucket: 'none', clickThroughRate: 0.5, conversionRate: 0.2 });

    expect(result.idealCustomers).toBe(100);
    expect(result.monthlyLoss).toBe(2250);
  });

  it('rejects negative or out-of-range inputs', () => {
    expect(() => estimateRevenueLoss({ ...base, monthlySearchVolume: -1, rankBucket: 'none' })).toThrow(RangeError);
    expect(() => estimateRevenueLoss({ ...base, averageOrderValue: Number.NaN, rankBucket: 'none' })).toThrow(RangeError);
    expect(() => estimateRevenueLoss({ ...base, rankBucket: 'none', clickThroughRate: 1.5 })).toThrow(
      'clickThroughRate must be a finite number between 0 and 1, got 1.5'
    );
  });
});
