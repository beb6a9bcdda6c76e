/**
 * Rate Limit Store Interface Definitions
 * Defines the contract for window stores (Memory, Redis).
 */

/**
 * Per caller-key accounting state.
 */
export interface RateWindow {
  windowStart: number;
  count: number;
}

export type Admission =
  | { readonly admitted: true; readonly count: number; readonly remaining: number }
  | { readonly admitted: false; readonly count: number; readonly retryAfterMs: number };

export interface RateLimitStore {
  /**
   * Atomically check the window for `key` and charge one request if
   * `count < ceiling`. Rejections do not change the count.
   */
  admit(key: string, ceiling: number, windowMs: number): Promise<Admission>;

  /**
   * Release connections held by the store.
   */
  close(): Promise<void>;

  /**
   * Returns 'memory' or 'redis' for diagnostics.
   */
  getType(): string;
}
