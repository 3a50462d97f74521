/**
 * Raised when the engine configuration cannot produce a valid run
 * (e.g. a tournament larger than the population). Always thrown synchronously
 * from `run()`, before any generation is scored, and never retried.
 */
export class GeneticConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeneticConfigError';
  }
}
