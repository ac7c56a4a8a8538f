/**
 * @fileoverview Request-body parsing for the KPI operations.
 *
 * Parameters come from the operation catalogue, so the accepted fields are
 * exactly the ones advertised in the tool registry.
 *
 * @module lib/sustainability/requests
 */

import { getOperationDefinition, type OperationName } from './operations';

export interface ValidationIssue {
  field: string;
  message: string;
}

export class RequestValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues.map(issue => `${issue.field}: ${issue.message}`).join('; ') || 'Invalid request body');
    this.name = 'RequestValidationError';
    this.issues = issues;
  }
}

export interface GetKpisInput {
  site_id: string;
  period: string;
}

export interface CompareKpisInput {
  site_id: string;
  current_period: string;
  previous_period: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseOperationInput(operationName: OperationName, body: unknown): Record<string, string> {
  if (!isRecord(body)) {
    throw new RequestValidationError([{ field: 'body', message: 'must be a JSON object' }]);
  }

  const issues: ValidationIssue[] = [];
  const values: Record<string, string> = {};

  for (const param of getOperationDefinition(operationName).parameters) {
    const raw = body[param.name];

    if (raw === undefined || raw === null) {
      if (param.default !== undefined) {
        values[param.name] = param.default;
      } else {
        issues.push({ field: param.name, message: 'is required' });
      }
      continue;
    }

    if (typeof raw !== 'string') {
      issues.push({ field: param.name, message: 'must be a string' });
      continue;
    }

    const text = raw.trim();
    if (!text) {
      issues.push({ field: param.name, message: 'must not be empty' });
      continue;
    }
    values[param.name] = text;
  }

  if (issues.length) {
    throw new RequestValidationError(issues);
  }
  return values;
}

export function parseGetKpisInput(body: unknown): GetKpisInput {
  const values = parseOperationInput('GetSiteKpis', body);
  return { site_id: values.site_id, period: values.period };
}

export function parseCompareKpisInput(body: unknown): CompareKpisInput {
  const values = parseOperationInput('CompareSiteKpis', body);
  return {
    site_id: values.site_id,
    current_period: values.current_period,
    previous_period: values.previous_period,
  };
}
