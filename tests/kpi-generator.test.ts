import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { generateSiteKpis, KPI_RANGES, kpiDigest, seedKey } from '@/lib/sustainability/kpi-generator';
import { round } from '@/lib/sustainability/numeric-policy';
import { listSites } from '@/lib/sustainability/sites';

const PERIODS = ['current', 'previous', 'last_month', 'last_quarter', '2024-Q3'];
const SITE_IDS = [...listSites().map(site => site.site_id), 'unknown-site', 'x'];

function allRecords() {
  return SITE_IDS.flatMap(siteId => PERIODS.map(period => generateSiteKpis(siteId, period)));
}

describe('generateSiteKpis', () => {
  it('reproduces the helsinki-hq current record', () => {
    assert.deepEqual(generateSiteKpis('helsinki-hq', 'current'), {
      site_id: 'helsinki-hq',
      period: 'current',
      meals_served: 4424,
      food_waste_kg: 460.6,
      food_waste_per_meal_g: 104.1,
      co2_per_meal_kg: 1.73,
      vegetarian_share_percent: 68.3,
      total_co2_kg: 7653.5,
    });
  });

  it('reproduces the helsinki-hq previous record', () => {
    assert.deepEqual(generateSiteKpis('helsinki-hq', 'previous'), {
      site_id: 'helsinki-hq',
      period: 'previous',
      meals_served: 1747,
      food_waste_kg: 429.9,
      food_waste_per_meal_g: 246.1,
      co2_per_meal_kg: 1.74,
      vegetarian_share_percent: 55,
      total_co2_kg: 3039.8,
    });
  });

  it('returns identical records on repeated calls', () => {
    const first = generateSiteKpis('helsinki-hq', 'current');
    const second = generateSiteKpis('helsinki-hq', 'current');
    assert.notEqual(first, second);
    assert.deepEqual(first, second);
    assert.equal(JSON.stringify(first), JSON.stringify(second));
  });

  it('produces different records for different inputs', () => {
    const serialized = new Set(
      allRecords().map(({ site_id: _site, period: _period, ...metrics }) => JSON.stringify(metrics)),
    );
    assert.ok(serialized.size > 1);
    assert.notDeepEqual(
      { ...generateSiteKpis('espoo-campus', 'current'), site_id: '', period: '' },
      { ...generateSiteKpis('espoo-campus', 'previous'), site_id: '', period: '' },
    );
  });

  it('keeps every field within its range', () => {
    for (const record of allRecords()) {
      assert.ok(Number.isInteger(record.meals_served));
      assert.ok(record.meals_served >= KPI_RANGES.mealsServed.min && record.meals_served < KPI_RANGES.mealsServed.max);
      assert.ok(record.food_waste_kg >= KPI_RANGES.foodWasteKg.min && record.food_waste_kg <= KPI_RANGES.foodWasteKg.max);
      assert.ok(record.co2_per_meal_kg >= KPI_RANGES.co2PerMealKg.min && record.co2_per_meal_kg <= KPI_RANGES.co2PerMealKg.max);
      assert.ok(record.vegetarian_share_percent >= 0 && record.vegetarian_share_percent <= 100);
      assert.ok(record.food_waste_per_meal_g >= 0);
      assert.ok(record.total_co2_kg >= 0);
    }
  });

  it('keeps derived fields consistent with their inputs', () => {
    for (const record of allRecords()) {
      assert.equal(record.total_co2_kg, round(record.co2_per_meal_kg * record.meals_served, 1));
      assert.equal(record.food_waste_per_meal_g, round((record.food_waste_kg * 1000) / record.meals_served, 1));
    }
  });

  it('separates site and period in the seed key', () => {
    assert.equal(seedKey('helsinki-hq', 'current'), 'helsinki-hq|current');
    assert.notDeepEqual(kpiDigest('ab', 'c'), kpiDigest('a', 'bc'));
    assert.equal(kpiDigest('helsinki-hq', 'current').length, 32);
  });
});
