export type TimeoutConfig = {
  /** Limit on waiting for response headers. */
  readonly requestMs?: number;
  /** Limit on the gap between two chunks of a streamed body. */
  readonly streamReadMs?: number;
};
