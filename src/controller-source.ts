/**
 * Controller tool source
 *
 * Discovers tools from declaratively described controllers: each action of a
 * controller becomes one operation named `{Controller}_{action}`.
 */

import type {
  DiscoveredOperation,
  HttpVerb,
  RawParameterMetadata,
  ToolDefinitionSource,
} from './types/host.js';
import type { Logger } from './logger.js';

export interface ActionDescriptor {
  /** Host method invoked for this action */
  method: string;
  /** Tool-facing action name, defaults to `method` */
  name?: string;
  description?: string;
  httpMethod?: HttpVerb;
  /** Action route template, e.g. `{id:int}` or `items/{itemId?}` */
  route?: string;
  isStatic?: boolean;
  parameters?: readonly RawParameterMetadata[];
}

export interface ControllerDescriptor {
  /** Class-style name; a trailing `Controller` is dropped from tool names */
  name: string;
  /** Resolver id of the handler, defaults to `name` */
  handlerId?: string;
  /** Controller route template, e.g. `api/orders/{tenant}` */
  route?: string;
  actions: readonly ActionDescriptor[];
}

export interface ToolNamingOptions {
  includeControllerNameInToolName?: boolean;
  excludedControllers?: readonly string[];
}

const CONTROLLER_SUFFIX = /Controller$/i;

/**
 * Controller name as used in tool names and exclusion lists
 */
export function controllerShortName(name: string): string {
  return name.replace(CONTROLLER_SUFFIX, '');
}

export class ControllerToolSource implements ToolDefinitionSource {
  private excluded: ReadonlySet<string>;

  constructor(
    private controllers: readonly ControllerDescriptor[],
    private options: ToolNamingOptions = {},
    private logger?: Logger
  ) {
    this.excluded = new Set(
      (options.excludedControllers ?? []).map(name => controllerShortName(name).toLowerCase())
    );
  }

  discover(): DiscoveredOperation[] {
    const includeControllerName = this.options.includeControllerNameInToolName ?? true;
    const operations: DiscoveredOperation[] = [];

    for (const controller of this.controllers) {
      const shortName = controllerShortName(controller.name);
      if (this.excluded.has(shortName.toLowerCase())) {
        this.logger?.debug('Skipping excluded controller', { controller: controller.name });
        continue;
      }

      for (const action of controller.actions) {
        const actionName = action.name ?? action.method;
        const templates = [action.route, controller.route]
          .filter((template): template is string => template !== undefined)
          .map(template => expandTokens(template, shortName, actionName));

        operations.push({
          toolName: includeControllerName ? `${shortName}_${actionName}` : actionName,
          handlerId: controller.handlerId ?? controller.name,
          methodId: action.method,
          isStatic: Boolean(action.isStatic),
          description: action.description ?? `Action method ${action.method} from controller ${controller.name}`,
          httpMethod: action.httpMethod,
          routeTemplates: templates,
          parameters: action.parameters ?? [],
        });
      }
    }

    return operations;
  }
}

/**
 * Replace `[controller]` and `[action]` tokens in a route template
 */
function expandTokens(template: string, controller: string, action: string): string {
  return template.replace(/\[controller\]/gi, controller).replace(/\[action\]/gi, action);
}
