/**
 * Process-wide default options, held in an explicit registry.
 *
 * The renderers never look here: a Formatter resolves its options against
 * the registry it is handed, once, at construction.
 */

import { DEFAULT_OPTIONS, mergeUserOptions, resolveOptions, type ResolvedOptions, type UserOptions } from './options.js';

export class DefaultsRegistry {
  private layer: UserOptions;
  private resolved: ResolvedOptions;

  constructor(initial: UserOptions = {}) {
    this.layer = mergeUserOptions(initial);
    this.resolved = resolveOptions(this.layer, DEFAULT_OPTIONS);
  }

  /** Current defaults, fully resolved */
  get(): ResolvedOptions {
    return this.resolved;
  }

  /** Options set on top of the built-in defaults */
  overrides(): UserOptions {
    return { ...this.layer };
  }

  /**
   * Update defaults. The update is validated before anything changes.
   * @throws ConfigError
   */
  set(partial: UserOptions): ResolvedOptions {
    const layer = mergeUserOptions(this.layer, partial);
    this.resolved = resolveOptions(layer, DEFAULT_OPTIONS);
    this.layer = layer;
    return this.resolved;
  }

  reset(): void {
    this.layer = {};
    this.resolved = DEFAULT_OPTIONS;
  }

  /** Resolve caller options on top of these defaults */
  resolve(options: UserOptions = {}): ResolvedOptions {
    return resolveOptions(mergeUserOptions(this.layer, options), DEFAULT_OPTIONS);
  }

  /**
   * Run `fn` with temporary defaults; the previous defaults come back even
   * when `fn` throws.
   */
  withOverrides<T>(partial: UserOptions, fn: () => T): T {
    const savedLayer = this.layer;
    const savedResolved = this.resolved;
    this.set(partial);
    try {
      return fn();
    } finally {
      this.layer = savedLayer;
      this.resolved = savedResolved;
    }
  }
}

/** Shared registry used when no other is given */
export const globalDefaults = new DefaultsRegistry();
