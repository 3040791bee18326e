/**
 * Parameter source inference
 *
 * Decides where a parameter's value would come from in the originating HTTP
 * framework. Rules are evaluated in order; the first match wins:
 *
 *   1. explicit binding-source hint
 *   2. name matches a {segment} of a route template  => route
 *   3. primitive, enum or array of those, no hint      => query
 *   4. object type, no hint                            => body
 *
 * A header source is produced only by an explicit hint (rule 1).
 */

import type { BindingSourceInspector, DiscoveredOperation, RawParameterMetadata, TypeRef } from './types/host.js';
import type { ParameterSource } from './types/tool.js';

const ROUTE_SEGMENT = /\{\*{0,2}(\w+)(?::[^}]*)?\??\}/g;

export interface InferenceInput {
  parameter: RawParameterMetadata;
  explicitSource?: ParameterSource;
  routeParameters: ReadonlySet<string>;
}

export interface SourceRule {
  name: string;
  apply(input: InferenceInput): ParameterSource | undefined;
}

export function isSimpleType(type: TypeRef): boolean {
  switch (type.kind) {
    case 'primitive':
    case 'enum':
      return true;
    case 'array':
      return isSimpleType(type.element);
    default:
      return false;
  }
}

export const SOURCE_RULES: readonly SourceRule[] = [
  {
    name: 'explicit-hint',
    apply: ({ explicitSource }) => explicitSource,
  },
  {
    name: 'route-template',
    apply: ({ parameter, routeParameters }) =>
      routeParameters.has(parameter.name) ? 'route' : undefined,
  },
  {
    name: 'simple-type',
    apply: ({ parameter }) => (isSimpleType(parameter.type) ? 'query' : undefined),
  },
  {
    name: 'complex-type',
    apply: ({ parameter }) =>
      parameter.type.kind === 'object' || parameter.type.kind === 'array' || parameter.type.kind === 'unknown'
        ? 'body'
        : undefined,
  },
];

/**
 * Names of the {segments} in a route template, with constraints
 * ({id:int}), optional markers ({id?}) and catch-alls ({**path}) stripped
 */
export function extractRouteParameters(template: string): string[] {
  return [...template.matchAll(ROUTE_SEGMENT)].map(match => match[1]);
}

export function inferParameterSource(
  input: InferenceInput,
  rules: readonly SourceRule[] = SOURCE_RULES
): ParameterSource | undefined {
  for (const rule of rules) {
    const source = rule.apply(input);
    if (source) return source;
  }
  return undefined;
}

/**
 * Default inspector: reads the hints carried on the discovered metadata itself
 */
export const metadataBindingSourceInspector: BindingSourceInspector = {
  explicitSource: parameter => parameter.source,
  routeTemplates: operation => operation.routeTemplates,
};

export function routeParametersOf(
  operation: DiscoveredOperation,
  inspector: BindingSourceInspector = metadataBindingSourceInspector
): Set<string> {
  const names = new Set<string>();
  for (const template of inspector.routeTemplates(operation)) {
    for (const name of extractRouteParameters(template)) {
      names.add(name);
    }
  }
  return names;
}
