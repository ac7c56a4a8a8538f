/**
 * Shared sustainability contracts. Wire records keep the snake_case field
 * names that clients and the tool registry already depend on.
 */

export type SiteSegment = 'workplace' | 'school' | 'healthcare' | 'senior' | 'logistics';

export interface SiteInfo {
  site_id: string;
  name: string;
  region: string;
  segment: SiteSegment;
}

/** Opaque reporting-interval label; see KNOWN_PERIODS for the conventional ones. */
export type Period = string;

export interface SiteKpis {
  site_id: string;
  period: Period;
  meals_served: number;
  food_waste_kg: number;
  food_waste_per_meal_g: number;
  co2_per_meal_kg: number;
  vegetarian_share_percent: number;
  total_co2_kg: number;
}

export type Trend = 'up' | 'down' | 'flat';

export interface DeltaKpis {
  site_id: string;
  current_period: Period;
  previous_period: Period;

  current: SiteKpis;
  previous: SiteKpis;

  delta_food_waste_per_meal_g: number;
  delta_co2_per_meal_kg: number;
  delta_vegetarian_share_percent: number;

  waste_trend: Trend;
  co2_trend: Trend;
  vegetarian_trend: Trend;
}
