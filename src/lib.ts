/**
 * Library exports for programmatic usage
 */
export { MCPServer, type MCPServerOptions } from './mcp-server.js';
export { RequestDispatcher, type DispatchOptions } from './dispatcher.js';
export { createServerContext, type ServerContext, type ServerIdentity } from './server-context.js';
export { ToolRegistry } from './tool-registry.js';
export { SchemaGenerator } from './schema-generator.js';
export { ToolGenerator } from './tool-generator.js';
export { ParameterBinder, type BindResult } from './parameter-binder.js';
export { Invoker, type InvokeResult, type ToolCallResult } from './invoker.js';
export { ErrorMapper } from './error-mapper.js';
export { ControllerToolSource, type ControllerDescriptor, type ActionDescriptor, type ToolNamingOptions } from './controller-source.js';
export { ServiceHandlerResolver, type HandlerLifetime } from './handler-resolver.js';
export { ActionResult, Results, isActionResult } from './action-result.js';
export { HttpTransport } from './http-transport.js';
export { StdioTransport } from './stdio-transport.js';
export { MetricsCollector } from './metrics.js';
export { ConsoleLogger, JsonLogger, LogLevel, createLogger, type Logger } from './logger.js';
export { loadConfig, type AppConfig } from './config.js';
export { ToolOptionsLoader, parseToolOptions } from './tool-options-loader.js';
export { t, defineClass, defineEnum } from './host-types.js';
export { extractRouteParameters, inferParameterSource, SOURCE_RULES } from './source-inference.js';
export * from './errors.js';
export type * from './types/host.js';
export type * from './types/tool.js';
export type { JsonRpcRequest, JsonRpcResponse, JsonRpcErrorObject, JsonRpcId } from './jsonrpc-validator.js';
