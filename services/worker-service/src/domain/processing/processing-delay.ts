import { countCharacters } from '@log-ingest/shared';

export const DEFAULT_PROCESSING_MS_PER_CHAR = 50;

export function computeProcessingDelayMs(text: string, msPerChar: number = DEFAULT_PROCESSING_MS_PER_CHAR): number {
  return countCharacters(text) * msPerChar;
}

// Whole milliseconds divided once, so 17 chars at 50 ms reports 0.85 and not 0.8500000000000001.
export function toProcessingSeconds(delayMs: number): number {
  return delayMs / 1000;
}
