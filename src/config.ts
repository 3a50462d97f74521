/**
 * Global evogen configuration contract & default instance.
 *
 * A central `config` object offers a documented surface for end-users (and tests)
 * to tweak library-wide behaviour without digging through scattered constants.
 * Per-run knobs (population size, operators, ending criterion) live on the
 * engine options instead; only cross-cutting flags belong here.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'evogen';
 *   config.warnings = true;        // print degenerate-input warnings
 *   config.logPrefix = '[my-run]'; // tag generation log lines
 *
 * Adjust BEFORE calling `run()` so that the engine reads the intended values.
 */
export interface EvogenConfig {
  /**
   * Emit warnings about degenerate numeric input (e.g. a roulette wheel whose
   * total fitness is not positive) to `console.warn`. Each kind is reported once.
   * Default: false
   */
  warnings: boolean;

  /**
   * Prefix prepended to every run log line.
   * Default: '[evogen]'
   */
  logPrefix: string;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: EvogenConfig = {
  warnings: false, // emit runtime guidance
  logPrefix: '[evogen]', // run log tag
};
