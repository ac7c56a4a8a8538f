/**
 * @fileoverview Tool-exposed operations.
 *
 * Single source for the HTTP wiring, request parsing and the tool-registry
 * manifest. Renaming a parameter here changes all three.
 *
 * @module lib/sustainability/operations
 */

export const KNOWN_PERIODS = ['current', 'previous', 'last_month', 'last_quarter'] as const;

export type OperationName = 'ListSites' | 'GetSiteKpis' | 'CompareSiteKpis';

export type HttpMethod = 'GET' | 'POST';

export interface OperationParameter {
  name: string;
  description: string;
  /** Applied by the request parser when the field is absent. */
  default?: string;
}

export interface OperationDefinition {
  name: OperationName;
  description: string;
  method: HttpMethod;
  path: string;
  parameters: OperationParameter[];
}

const SITE_ID_PARAMETER: OperationParameter = {
  name: 'site_id',
  description: 'ID of the site (e.g. helsinki-hq).',
};

export const OPERATION_DEFINITIONS: readonly OperationDefinition[] = [
  {
    name: 'ListSites',
    description: 'Return all available sites.',
    method: 'GET',
    path: '/sites',
    parameters: [],
  },
  {
    name: 'GetSiteKpis',
    description: 'Return sustainability KPIs for the given site and period.',
    method: 'POST',
    path: '/get-kpis',
    parameters: [
      SITE_ID_PARAMETER,
      {
        name: 'period',
        description: `Time period (${KNOWN_PERIODS.join(', ')}).`,
        default: 'current',
      },
    ],
  },
  {
    name: 'CompareSiteKpis',
    description: 'Compare sustainability KPIs between two periods for a site.',
    method: 'POST',
    path: '/compare-kpis',
    parameters: [
      SITE_ID_PARAMETER,
      { name: 'current_period', description: 'Current period (e.g. current).', default: 'current' },
      { name: 'previous_period', description: 'Previous period (e.g. previous).', default: 'previous' },
    ],
  },
];

export function getOperationDefinition(name: OperationName): OperationDefinition {
  const definition = OPERATION_DEFINITIONS.find(op => op.name === name);
  if (!definition) {
    throw new Error(`Unknown operation: ${name}`);
  }
  return definition;
}
