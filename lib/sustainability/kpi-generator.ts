/**
 * @fileoverview Deterministic mock KPI generator.
 *
 * Every record is derived from the SHA-256 digest of `${siteId}|${period}`:
 * field i reads the big-endian uint32 at byte offset 4 * i, scales it to a
 * fraction in [0, 1) and maps that onto the field's fixed range. The same
 * identifiers produce the same record on every call, process and platform.
 *
 * @module lib/sustainability/kpi-generator
 */

import crypto from 'crypto';
import type { Period, SiteKpis } from './types';
import { round, safeDivide, scaleFraction } from './numeric-policy';

export interface KpiRange {
  min: number;
  max: number;
}

export const KPI_RANGES = {
  mealsServed: { min: 500, max: 5000 },
  foodWasteKg: { min: 50, max: 600 },
  co2PerMealKg: { min: 0.3, max: 2.5 },
  vegetarianSharePercent: { min: 10, max: 70 },
} as const satisfies Record<string, KpiRange>;

const UINT32_SPAN = 2 ** 32;

export function seedKey(siteId: string, period: Period): string {
  return `${siteId}|${period}`;
}

export function kpiDigest(siteId: string, period: Period): Buffer {
  return crypto.createHash('sha256').update(seedKey(siteId, period), 'utf8').digest();
}

function sample(digest: Buffer, slot: number, range: KpiRange): number {
  const fraction = digest.readUInt32BE(slot * 4) / UINT32_SPAN;
  return scaleFraction(fraction, range.min, range.max);
}

export function generateSiteKpis(siteId: string, period: Period): SiteKpis {
  const digest = kpiDigest(siteId, period);

  const mealsServed = Math.floor(sample(digest, 0, KPI_RANGES.mealsServed));
  const foodWasteKg = round(sample(digest, 1, KPI_RANGES.foodWasteKg), 1);
  const co2PerMealKg = round(sample(digest, 2, KPI_RANGES.co2PerMealKg), 2);
  const vegetarianSharePercent = round(sample(digest, 3, KPI_RANGES.vegetarianSharePercent), 1);

  return {
    site_id: siteId,
    period,
    meals_served: mealsServed,
    food_waste_kg: foodWasteKg,
    food_waste_per_meal_g: round(safeDivide(foodWasteKg * 1000, mealsServed), 1),
    co2_per_meal_kg: co2PerMealKg,
    vegetarian_share_percent: vegetarianSharePercent,
    total_co2_kg: round(co2PerMealKg * mealsServed, 1),
  };
}
