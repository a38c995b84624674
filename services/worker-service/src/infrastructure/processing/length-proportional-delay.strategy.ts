import { setTimeout as sleep } from 'node:timers/promises';
import type { ProcessingDelayStrategy } from '../../application/processing/ports/processing-delay.port';
import { computeProcessingDelayMs, toProcessingSeconds } from '../../domain/processing/processing-delay';

export type SleepFn = (delayMs: number) => Promise<unknown>;

/** Suspends only the current delivery; other deliveries keep running on the event loop. */
export class LengthProportionalDelayStrategy implements ProcessingDelayStrategy {
  constructor(
    private readonly msPerChar: number,
    private readonly sleepFn: SleepFn = sleep,
  ) {}

  async simulate(text: string): Promise<number> {
    const delayMs = computeProcessingDelayMs(text, this.msPerChar);
    if (delayMs > 0) {
      await this.sleepFn(delayMs);
    }
    return toProcessingSeconds(delayMs);
  }
}
