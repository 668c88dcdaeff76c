/**
 * @module exchange-logger
 * @description Mask scopes. Tracks which named rule sets apply to the code running now.
 *
 * Each async call chain gets its own stack through AsyncLocalStorage, so
 * concurrent requests never see each other's scopes. Code outside any
 * `run()` shares the context's root stack.
 *
 * @server-only Requires Node.js (AsyncLocalStorage).
 *
 * @example
 * ```ts
 * const context = new MaskContext();
 *
 * await context.run('payments', async () => {
 *   context.activeNames(); // → Set { 'payments' }
 *   await context.run(['cards', 'tokens'], async () => {
 *     context.activeNames(); // → Set { 'payments', 'cards', 'tokens' }
 *   });
 * });
 * ```
 */

import { AsyncLocalStorage } from "node:async_hooks";

export type MaskNames = string | Iterable<string>;

/** Accept a single name or any collection of names */
export function toNameSet(names: MaskNames | undefined): Set<string> {
  if (names === undefined) return new Set();
  if (typeof names === "string") return new Set([names]);
  return new Set(names);
}

/**
 * LIFO stack of name sets. Not safe to share between concurrent operations.
 */
export class MaskContextStack {
  private readonly _frames: Set<string>[];

  constructor(frames: Set<string>[] = []) {
    this._frames = [...frames];
  }

  get depth(): number {
    return this._frames.length;
  }

  push(names: MaskNames): void {
    this._frames.push(toNameSet(names));
  }

  pop(): Set<string> {
    const frame = this._frames.pop();
    if (frame === undefined) {
      throw new Error("MaskContextStack.pop() called on an empty stack");
    }
    return frame;
  }

  /** Union of every pushed frame */
  activeNames(): Set<string> {
    const active = new Set<string>();
    for (const frame of this._frames) {
      for (const name of frame) active.add(name);
    }
    return active;
  }

  /** Copy with the same frames, for a nested async context */
  fork(): MaskContextStack {
    return new MaskContextStack(this._frames);
  }
}

/** Handle for a scope pushed with `enter()` */
export interface MaskScope {
  readonly names: ReadonlySet<string>;
  /** Pop the scope. Safe to call more than once. */
  release(): void;
}

export class MaskContext {
  private readonly _storage = new AsyncLocalStorage<MaskContextStack>();
  private readonly _root = new MaskContextStack();

  /** The stack of the running async context */
  current(): MaskContextStack {
    return this._storage.getStore() ?? this._root;
  }

  activeNames(): Set<string> {
    return this.current().activeNames();
  }

  /**
   * Run `fn` with `names` pushed on a private copy of the current stack.
   * Works for sync and async `fn`; the scope ends with the call chain.
   */
  run<T>(names: MaskNames, fn: () => T): T {
    const stack = this.current().fork();
    stack.push(names);
    return this._storage.run(stack, fn);
  }

  /**
   * Push `names` on the current stack until the returned scope is released.
   * Release it in a `finally` block.
   */
  enter(names: MaskNames): MaskScope {
    const stack = this.current();
    const frameNames = toNameSet(names);
    stack.push(frameNames);
    const depth = stack.depth;
    let released = false;

    return {
      names: frameNames,
      release() {
        if (released) return;
        if (stack.depth !== depth) {
          throw new Error("Mask scopes released out of order");
        }
        released = true;
        stack.pop();
      },
    };
  }
}
