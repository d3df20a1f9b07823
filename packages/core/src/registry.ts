/**
 * Generic registry for pluggable implementations.
 */
import { Effect } from "effect";
import { ConfigError } from "./errors.js";

/** `A` is the argument list every factory takes. */
export class Registry<T, A extends unknown[] = []> {
  private readonly _map = new Map<string, (...args: A) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (...args: A) => T): void {
    this._map.set(name, factory);
  }

  /** Construct a fresh instance, failing with the list of known names. */
  resolve(name: string, ...args: A): Effect.Effect<T, ConfigError> {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      return Effect.fail(new ConfigError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
      }));
    }
    return Effect.sync(() => factory(...args));
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
