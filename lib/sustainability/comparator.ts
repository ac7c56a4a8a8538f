/**
 * @fileoverview Period-over-period comparison of generated KPIs.
 *
 * Trends follow the raw sign of the delta (up = increased), not whether the
 * change is an improvement. Deltas inside the dead zone are 'flat'.
 *
 * @module lib/sustainability/comparator
 */

import type { DeltaKpis, Period, Trend } from './types';
import { generateSiteKpis } from './kpi-generator';
import { round } from './numeric-policy';

export const TREND_THRESHOLDS = {
  foodWastePerMealG: 5.0,
  co2PerMealKg: 0.05,
  vegetarianSharePercent: 2.0,
} as const;

export function classifyTrend(delta: number, threshold: number): Trend {
  if (delta > threshold) return 'up';
  if (delta < -threshold) return 'down';
  return 'flat';
}

export function compareSiteKpis(siteId: string, currentPeriod: Period, previousPeriod: Period): DeltaKpis {
  const current = generateSiteKpis(siteId, currentPeriod);
  const previous = generateSiteKpis(siteId, previousPeriod);

  const deltaWaste = round(current.food_waste_per_meal_g - previous.food_waste_per_meal_g, 1);
  const deltaCo2 = round(current.co2_per_meal_kg - previous.co2_per_meal_kg, 2);
  const deltaVeg = round(current.vegetarian_share_percent - previous.vegetarian_share_percent, 1);

  return {
    site_id: siteId,
    current_period: currentPeriod,
    previous_period: previousPeriod,
    current,
    previous,
    delta_food_waste_per_meal_g: deltaWaste,
    delta_co2_per_meal_kg: deltaCo2,
    delta_vegetarian_share_percent: deltaVeg,
    waste_trend: classifyTrend(deltaWaste, TREND_THRESHOLDS.foodWastePerMealG),
    co2_trend: classifyTrend(deltaCo2, TREND_THRESHOLDS.co2PerMealKg),
    vegetarian_trend: classifyTrend(deltaVeg, TREND_THRESHOLDS.vegetarianSharePercent),
  };
}
