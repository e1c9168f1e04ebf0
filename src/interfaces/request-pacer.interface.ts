export const SEC_REQUEST_PACER = Symbol('SEC_REQUEST_PACER');

/**
 * Waits before an outbound request to respect a provider's rate limit.
 */
export interface RequestPacer {
  pace(): Promise<void>;
}

export class FixedDelayPacer implements RequestPacer {
  constructor(readonly delayMs: number) {}

  async pace(): Promise<void> {
    if (this.delayMs <= 0) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
  }
}
