import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildToolRegistry, TOOL_REGISTRY_VERSION } from '@/lib/sustainability/tool-registry';
import { getOperationDefinition, OPERATION_DEFINITIONS } from '@/lib/sustainability/operations';

describe('buildToolRegistry', () => {
  const registry = buildToolRegistry('https://kpi.example.test');

  it('lists exactly the three tool operations', () => {
    assert.equal(registry.version, TOOL_REGISTRY_VERSION);
    assert.deepEqual(
      registry.functions.map(fn => fn.name),
      ['ListSites', 'GetSiteKpis', 'CompareSiteKpis'],
    );
  });

  it('gives every entry a name, a description and an object schema', () => {
    for (const fn of registry.functions) {
      assert.ok(fn.name.length > 0);
      assert.ok(fn.description.length > 0);
      assert.equal(fn.parameters.type, 'object');
      for (const field of fn.parameters.required) {
        assert.equal(fn.parameters.properties[field].type, 'string');
        assert.ok(fn.parameters.properties[field].description.length > 0);
      }
      assert.deepEqual(Object.keys(fn.parameters.properties), fn.parameters.required);
    }
  });

  it('serialises to the JSON shape the agent platform reads', () => {
    const parsed: unknown = JSON.parse(JSON.stringify(registry));
    assert.deepEqual(parsed, {
      version: '1.0',
      functions: [
        {
          name: 'ListSites',
          description: 'Return all available sites.',
          parameters: { type: 'object', properties: {}, required: [] },
          'x-opal-http': { method: 'GET', url: 'https://kpi.example.test/sites' },
        },
        {
          name: 'GetSiteKpis',
          description: 'Return sustainability KPIs for the given site and period.',
          parameters: {
            type: 'object',
            properties: {
              site_id: { type: 'string', description: 'ID of the site (e.g. helsinki-hq).' },
              period: { type: 'string', description: 'Time period (current, previous, last_month, last_quarter).' },
            },
            required: ['site_id', 'period'],
          },
          'x-opal-http': { method: 'POST', url: 'https://kpi.example.test/get-kpis' },
        },
        {
          name: 'CompareSiteKpis',
          description: 'Compare sustainability KPIs between two periods for a site.',
          parameters: {
            type: 'object',
            properties: {
              site_id: { type: 'string', description: 'ID of the site (e.g. helsinki-hq).' },
              current_period: { type: 'string', description: 'Current period (e.g. current).' },
              previous_period: { type: 'string', description: 'Previous period (e.g. previous).' },
            },
            required: ['site_id', 'current_period', 'previous_period'],
          },
          'x-opal-http': { method: 'POST', url: 'https://kpi.example.test/compare-kpis' },
        },
      ],
    });
  });

  it('strips trailing slashes from the base url', () => {
    const urls = buildToolRegistry('http://localhost:8000//').functions.map(fn => fn['x-opal-http'].url);
    assert.deepEqual(urls, [
      'http://localhost:8000/sites',
      'http://localhost:8000/get-kpis',
      'http://localhost:8000/compare-kpis',
    ]);
  });

  it('follows the operation catalogue', () => {
    assert.equal(registry.functions.length, OPERATION_DEFINITIONS.length);
    assert.equal(getOperationDefinition('CompareSiteKpis').path, '/compare-kpis');
  });
});
