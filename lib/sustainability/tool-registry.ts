/**
 * @fileoverview Tool-registry manifest for the external agent platform.
 *
 * The `x-opal-http` key is part of the platform's discovery contract.
 *
 * @module lib/sustainability/tool-registry
 */

import { OPERATION_DEFINITIONS, type HttpMethod, type OperationDefinition } from './operations';
import { normalizeBaseUrl } from '@/lib/service-config';

export const TOOL_REGISTRY_VERSION = '1.0';

export interface JsonSchemaProperty {
  type: 'string';
  description: string;
}

export interface ToolParametersSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface ToolFunction {
  name: string;
  description: string;
  parameters: ToolParametersSchema;
  'x-opal-http': {
    method: HttpMethod;
    url: string;
  };
}

export interface ToolRegistry {
  version: string;
  functions: ToolFunction[];
}

function toParametersSchema(operation: OperationDefinition): ToolParametersSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const param of operation.parameters) {
    properties[param.name] = { type: 'string', description: param.description };
  }
  return {
    type: 'object',
    properties,
    required: operation.parameters.map(param => param.name),
  };
}

export function buildToolRegistry(baseUrl: string): ToolRegistry {
  const origin = normalizeBaseUrl(baseUrl);
  return {
    version: TOOL_REGISTRY_VERSION,
    functions: OPERATION_DEFINITIONS.map(operation => ({
      name: operation.name,
      description: operation.description,
      parameters: toParametersSchema(operation),
      'x-opal-http': {
        method: operation.method,
        url: `${origin}${operation.path}`,
      },
    })),
  };
}
