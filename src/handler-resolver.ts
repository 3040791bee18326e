/**
 * Service handler resolver
 *
 * Registration map of handler id -> factory. Scoped handlers are created at
 * most once per request scope and disposed when the scope ends; singletons
 * live for the process; transients are created on every resolve and disposed
 * with the scope that created them.
 */

import type { HandlerResolver, HandlerScope } from './types/host.js';
import { ConfigurationError, InternalError } from './errors.js';

export type HandlerLifetime = 'scoped' | 'singleton' | 'transient';

export interface HandlerRegistration {
  factory: () => object;
  lifetime: HandlerLifetime;
}

async function disposeInstance(instance: object): Promise<void> {
  const dispose: unknown = Reflect.get(instance, 'dispose');
  if (typeof dispose === 'function') {
    await Reflect.apply(dispose, instance, []);
  }
}

class RequestScope implements HandlerScope {
  private instances = new Map<string, object>();
  private created: object[] = [];
  private disposed = false;

  constructor(private resolver: ServiceHandlerResolver) {}

  resolve(handlerId: string): object {
    if (this.disposed) {
      throw new InternalError(`Handler scope already disposed (resolving '${handlerId}')`);
    }

    const registration = this.resolver.registrationOf(handlerId);

    if (registration.lifetime === 'singleton') {
      return this.resolver.singleton(handlerId, registration);
    }

    if (registration.lifetime === 'scoped') {
      const existing = this.instances.get(handlerId);
      if (existing) return existing;
    }

    const instance = registration.factory();
    this.created.push(instance);
    if (registration.lifetime === 'scoped') {
      this.instances.set(handlerId, instance);
    }
    return instance;
  }

  /**
   * Dispose created instances in reverse creation order. Every instance is
   * disposed even if an earlier one fails; the first failure is rethrown.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const failures: unknown[] = [];
    for (const instance of this.created.reverse()) {
      try {
        await disposeInstance(instance);
      } catch (error) {
        failures.push(error);
      }
    }
    this.created = [];
    this.instances.clear();

    if (failures.length > 0) {
      throw failures[0];
    }
  }
}

export class ServiceHandlerResolver implements HandlerResolver {
  private registrations = new Map<string, HandlerRegistration>();
  private statics = new Map<string, object>();
  private singletons = new Map<string, object>();

  /**
   * Register a handler whose instance methods are exposed as tools
   */
  register(handlerId: string, factory: () => object, lifetime: HandlerLifetime = 'scoped'): this {
    if (this.registrations.has(handlerId)) {
      throw new ConfigurationError(`Handler already registered: ${handlerId}`, { handlerId });
    }
    this.registrations.set(handlerId, { factory, lifetime });
    return this;
  }

  /**
   * Register the target of static methods (typically the class itself).
   * May share its id with an instance registration of the same class.
   */
  registerStatic(handlerId: string, target: object): this {
    if (this.statics.has(handlerId)) {
      throw new ConfigurationError(`Static handler already registered: ${handlerId}`, { handlerId });
    }
    this.statics.set(handlerId, target);
    return this;
  }

  has(handlerId: string): boolean {
    return this.registrations.has(handlerId) || this.statics.has(handlerId);
  }

  /**
   * Fail fast at startup when tools reference handlers nobody registered
   */
  assertRegistered(handlerIds: Iterable<string>): void {
    const missing = [...new Set(handlerIds)].filter(id => !this.has(id));
    if (missing.length > 0) {
      throw new ConfigurationError(`Unregistered handlers: ${missing.join(', ')}`, { handlerIds: missing });
    }
  }

  createScope(): HandlerScope {
    return new RequestScope(this);
  }

  resolveStatic(handlerId: string): object {
    const target = this.statics.get(handlerId);
    if (!target) {
      throw new InternalError(`No static handler registered for '${handlerId}'`, { handlerId });
    }
    return target;
  }

  /** @internal */
  registrationOf(handlerId: string): HandlerRegistration {
    const registration = this.registrations.get(handlerId);
    if (!registration) {
      throw new InternalError(`No handler registered for '${handlerId}'`, { handlerId });
    }
    return registration;
  }

  /** @internal */
  singleton(handlerId: string, registration: HandlerRegistration): object {
    let instance = this.singletons.get(handlerId);
    if (!instance) {
      instance = registration.factory();
      this.singletons.set(handlerId, instance);
    }
    return instance;
  }

  /**
   * Dispose singletons at shutdown
   */
  async dispose(): Promise<void> {
    const instances = [...this.singletons.values()].reverse();
    this.singletons.clear();
    for (const instance of instances) {
      await disposeInstance(instance);
    }
  }
}
