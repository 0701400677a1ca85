import type {
  FactoryIdentity,
  IFactory,
  IFactoryRegistry,
} from "../types/factory";
import {
  duplicateRegistrationError,
  factoryNotRegisteredError,
  lockedError,
} from "../errors";
import { getDefaultLogger } from "../config";
import { identityOf } from "../definers/tools";
import type { Logger } from "./Logger";

export interface FactoryRegistryOptions {
  /** Replace an already registered factory instead of throwing. */
  allowOverride?: boolean;
  logger?: Logger;
}

/**
 * Lookup table from factory identity to live factory. Delegated fields hold
 * identities only and resolve them here at build time, so a factory may be
 * registered after the fields that point at it are declared.
 */
export class FactoryRegistry implements IFactoryRegistry {
  private factories: Map<string, IFactory<unknown>> = new Map();
  private locked = false;
  private readonly allowOverride: boolean;
  private readonly explicitLogger?: Logger;

  constructor(options: FactoryRegistryOptions = {}) {
    this.allowOverride = options.allowOverride ?? false;
    this.explicitLogger = options.logger;
  }

  private get logger(): Logger {
    return (this.explicitLogger ?? getDefaultLogger()).with({
      source: "fieldkit.registry",
    });
  }

  get size(): number {
    return this.factories.size;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  register(factory: IFactory<unknown>): void {
    this.checkLock();
    if (this.factories.has(factory.id) && !this.allowOverride) {
      duplicateRegistrationError.throw({ id: factory.id });
    }
    this.factories.set(factory.id, factory);
    this.logger.debug(`Registered factory "${factory.id}"`);
  }

  unregister(identity: FactoryIdentity): boolean {
    this.checkLock();
    const id = identityOf(identity);
    const removed = this.factories.delete(id);
    if (removed) {
      this.logger.debug(`Unregistered factory "${id}"`);
    }
    return removed;
  }

  has(identity: FactoryIdentity): boolean {
    return this.factories.has(identityOf(identity));
  }

  lookup(identity: FactoryIdentity): IFactory<unknown> | undefined {
    return this.factories.get(identityOf(identity));
  }

  /**
   * Same as lookup(), but an unknown identity is an error.
   */
  get(identity: FactoryIdentity): IFactory<unknown> {
    const factory = this.lookup(identity);
    if (!factory) {
      return factoryNotRegisteredError.throw({ id: identityOf(identity) });
    }
    return factory;
  }

  ids(): string[] {
    return Array.from(this.factories.keys());
  }

  clear(): void {
    this.checkLock();
    this.factories.clear();
  }

  lock(): void {
    this.locked = true;
  }

  private checkLock() {
    if (this.locked) {
      lockedError.throw({ what: "factory registry" });
    }
  }
}

/**
 * Process-wide registry used when a factory or delegated field is not given one.
 */
export const globalFactoryRegistry = new FactoryRegistry();
