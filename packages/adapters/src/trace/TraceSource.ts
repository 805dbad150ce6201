/**
 * Abstraction over where trace text comes from, for dependency injection.
 * Allows testing adapters without touching the filesystem.
 */
export interface TraceSource {
  /** Human-readable name for messages (file path, "stdin", ...) */
  readonly name: string;

  /**
   * Open the underlying source. Rejects with the underlying error when the
   * source cannot be opened.
   */
  open(): Promise<void>;

  /**
   * Lines of the trace, without line terminators.
   * Must only be called after open() resolved.
   */
  lines(): AsyncIterableIterator<string>;

  /**
   * Release resources. Safe to call more than once.
   */
  close(): Promise<void>;
}
