import type { MetricSnapshot, MetricSource, MetricVisitor } from '../types';
import { RegistrationError } from '../errors';

/**
 * Snapshot or a function producing one at enumeration time
 */
export type SnapshotProvider = MetricSnapshot | (() => MetricSnapshot);

/**
 * Named snapshot providers, enumerated in insertion order.
 *
 * The registry only reads providers; it does not collect or aggregate
 * values. Providers registered as functions are evaluated on every
 * enumeration, so each flush cycle sees the current state.
 */
export class SnapshotRegistry implements MetricSource {
  private readonly providers: Map<string, SnapshotProvider> = new Map();

  /**
   * Register a provider under a (possibly tagged) metric name.
   * @throws RegistrationError if the name is already registered
   */
  register(name: string, provider: SnapshotProvider): void {
    if (this.providers.has(name)) {
      throw new RegistrationError(`Metric already registered: ${name}`, name);
    }
    this.providers.set(name, provider);
  }

  /**
   * Register a provider, replacing any existing one with the same name.
   */
  set(name: string, provider: SnapshotProvider): void {
    this.providers.set(name, provider);
  }

  unregister(name: string): boolean {
    return this.providers.delete(name);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  clear(): void {
    this.providers.clear();
  }

  get size(): number {
    return this.providers.size;
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  each(visit: MetricVisitor): void {
    // Copy so a visitor that mutates the registry does not affect this pass
    for (const [name, provider] of [...this.providers]) {
      visit(name, typeof provider === 'function' ? provider() : provider);
    }
  }
}
