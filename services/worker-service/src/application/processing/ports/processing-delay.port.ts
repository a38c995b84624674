export const PROCESSING_DELAY_STRATEGY = Symbol('PROCESSING_DELAY_STRATEGY');

export interface ProcessingDelayStrategy {
  /** Waits as long as processing `text` takes and resolves with that duration in seconds. */
  simulate(text: string): Promise<number>;
}
