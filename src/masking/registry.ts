/**
 * @module exchange-logger
 * @description Named mask rule sets. Globals apply to every sanitize call.
 */

import { type MaskProcessor, SensitivePaths } from "./sensitive-paths.js";

/** Reserved name: masks everything, applied only when asked for */
export const ALL_MASK = "ALL";

export interface RegisterOptions {
  /** Apply to every sanitize call (default: false) */
  isGlobal?: boolean;
}

export class MaskRegistry {
  private readonly _processors = new Map<string, MaskProcessor>();
  private readonly _globals = new Set<string>();

  constructor() {
    this.register(ALL_MASK, new SensitivePaths("*"));
  }

  /**
   * Register `processor` under `name`, replacing any previous entry.
   */
  register(
    name: string,
    processor: MaskProcessor,
    options: RegisterOptions = {},
  ): void {
    this._processors.set(name, processor);
    if (options.isGlobal) {
      this._globals.add(name);
    }
  }

  /** Remove a processor and its global flag. Unknown names are ignored. */
  unregister(name: string): void {
    this._processors.delete(name);
    this._globals.delete(name);
  }

  get(name: string): MaskProcessor | undefined {
    return this._processors.get(name);
  }

  has(name: string): boolean {
    return this._processors.has(name);
  }

  globalNames(): Set<string> {
    return new Set(this._globals);
  }

  names(): string[] {
    return [...this._processors.keys()];
  }
}
