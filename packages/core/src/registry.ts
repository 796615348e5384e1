/**
 * Generic registry for pluggable implementations.
 *
 * Factories may take a parameter object (`P`), e.g. a partial config that is
 * merged over defaults by the factory itself.
 */
import { ConfigurationError } from "./errors.js";

export class Registry<T, P = void> {
  private readonly _map = new Map<string, (params: P) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (params: P) => T): void {
    this._map.set(name, factory);
  }

  get(name: string, params: P): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      throw new ConfigurationError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
      });
    }
    return factory(params);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
