/** The delivery can never succeed; redelivering it would loop forever. */
export class MalformedDeliveryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MalformedDeliveryError';
  }
}

/** Delay, redaction or storage failed; the same delivery may succeed later. */
export class TransientProcessingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransientProcessingError';
  }
}
