/**
 * Injectable delays, so retry loops can be tested without waiting.
 */

export interface DelayProvider {
  delay(ms: number): Promise<void>;
}

/**
 * Default delay provider using setTimeout.
 */
export class TimeoutDelayProvider implements DelayProvider {
  async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Mock delay provider for testing (instant delays).
 */
export class InstantDelayProvider implements DelayProvider {
  public delays: number[] = [];

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
  }
}
