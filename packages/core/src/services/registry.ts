/**
 * ServiceRegistry - Typed Service Container
 *
 * Holds the process-wide service instances (logger, memory service,
 * database adapter). Services are constructed explicitly at startup and
 * registered here; nothing builds itself from module state.
 *
 * Usage:
 *   import { getServiceRegistry, Services } from '@memvault/core';
 *   const memories = getServiceRegistry().get(Services.Memory);
 */

// ============================================================================
// ServiceToken
// ============================================================================

/**
 * Typed key for service registration and retrieval.
 */
export class ServiceToken<T> {
  /** @internal Brand field to preserve generic type information */
  declare readonly _type: T;

  constructor(public readonly name: string) {}

  toString(): string {
    return `ServiceToken(${this.name})`;
  }
}

// ============================================================================
// Disposable interface
// ============================================================================

export interface Disposable {
  dispose(): Promise<void> | void;
}

function isDisposable(value: unknown): value is Disposable {
  return (
    value !== null &&
    typeof value === 'object' &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

// ============================================================================
// ServiceRegistry
// ============================================================================

export class ServiceRegistry {
  private readonly instances = new Map<string, unknown>();
  private readonly disposables: Disposable[] = [];

  /**
   * Register a service instance.
   * If the instance implements Disposable, it will be cleaned up on dispose().
   */
  register<T>(token: ServiceToken<T>, instance: T): void {
    this.instances.set(token.name, instance);
    if (isDisposable(instance)) {
      this.disposables.push(instance);
    }
  }

  /**
   * Get a registered service. Throws if not found.
   */
  get<T>(token: ServiceToken<T>): T {
    if (!this.instances.has(token.name)) {
      throw new Error(
        `Service '${token.name}' not registered. ` +
        `Make sure it is registered during startup before use.`
      );
    }
    return this.instances.get(token.name) as T;
  }

  /**
   * Get a registered service, or null if not found.
   */
  tryGet<T>(token: ServiceToken<T>): T | null {
    return this.has(token) ? this.get(token) : null;
  }

  has<T>(token: ServiceToken<T>): boolean {
    return this.instances.has(token.name);
  }

  /** Names of all registered services */
  list(): string[] {
    return [...this.instances.keys()];
  }

  /**
   * Dispose all disposable services in reverse registration order.
   * Every service gets its turn; failures are rethrown together afterwards.
   */
  async dispose(): Promise<void> {
    const toDispose = [...this.disposables].reverse();
    const failures: unknown[] = [];
    for (const d of toDispose) {
      try {
        await d.dispose();
      } catch (error) {
        failures.push(error);
      }
    }
    this.instances.clear();
    this.disposables.length = 0;

    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} service(s) failed to dispose`);
    }
  }
}

// ============================================================================
// Singleton Access
// ============================================================================

let _registry: ServiceRegistry | null = null;

/**
 * Initialize the global ServiceRegistry.
 * Call once during application startup, before registering services.
 */
export function initServiceRegistry(): ServiceRegistry {
  if (_registry) {
    throw new Error(
      'ServiceRegistry already initialized. Call resetServiceRegistry() first if re-initializing.'
    );
  }
  _registry = new ServiceRegistry();
  return _registry;
}

/**
 * Get the global ServiceRegistry.
 * Throws if not initialized.
 */
export function getServiceRegistry(): ServiceRegistry {
  if (!_registry) {
    throw new Error(
      'ServiceRegistry not initialized. Call initServiceRegistry() during startup.'
    );
  }
  return _registry;
}

export function hasServiceRegistry(): boolean {
  return _registry !== null;
}

/**
 * Reset the global ServiceRegistry (shutdown and tests).
 * Disposes all registered services.
 */
export async function resetServiceRegistry(): Promise<void> {
  const registry = _registry;
  _registry = null;
  if (registry) {
    await registry.dispose();
  }
}
