import type { RankBucket, RevenueLossEstimate } from '../types';

export const DEFAULT_CLICK_THROUGH_RATE = 0.3;
export const DEFAULT_CONVERSION_RATE = 0.1;

/** Share of the ideal (top-3) customer flow a listing keeps at each rank bucket. */
export const RANK_BUCKET_FACTORS: Record<RankBucket, number> = {
  top3: 1.0,
  '4-10': 0.4,
  none: 0.1,
};

export interface RevenueLossInput {
  monthlySearchVolume: number;
  rankBucket: RankBucket;
  averageOrderValue: number;
  clickThroughRate?: number;
  conversionRate?: number;
}

function assertRange(name: string, value: number, min: number, max = Number.POSITIVE_INFINITY) {
  if (!Number.isFinite(value) || value < min || value > max) {
    const bound = Number.isFinite(max) ? `between ${min} and ${max}` : `at least ${min}`;
    throw new RangeError(`${name} must be a finite number ${bound}, got ${value}`);
  }
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export function estimateRevenueLoss(input: RevenueLossInput): RevenueLossEstimate {
  const ctr = input.clickThroughRate ?? DEFAULT_CLICK_THROUGH_RATE;
  const conversion = input.conversionRate ?? DEFAULT_CONVERSION_RATE;

  assertRange('monthlySearchVolume', input.monthlySearchVolume, 0);
  assertRange('averageOrderValue', input.averageOrderValue, 0);
  assertRange('clickThroughRate', ctr, 0, 1);
  assertRange('conversionRate', conversion, 0, 1);

  const idealCustomers = input.monthlySearchVolume * ctr * conversion;
  const currentCustomers = idealCustomers * RANK_BUCKET_FACTORS[input.rankBucket];
  const lostCustomers = idealCustomers - currentCustomers;
  const monthlyLoss = lostCustomers * input.averageOrderValue;

  return {
    rankBucket: input.rankBucket,
    monthlySearchVolume: input.monthlySearchVolume,
    averageOrderValue: input.averageOrderValue,
    clickThroughRate: ctr,
    conversionRate: conversion,
    idealCustomers: roundCents(idealCustomers),
    currentCustomers: roundCents(currentCustomers),
    lostCustomers: roundCents(lostCustomers),
    monthlyLoss: roundCents(monthlyLoss),
    annualLoss: roundCents(monthlyLoss * 12),
  };
}
