/**
 * Raised when a monitor cannot be constructed, e.g. the core count is unknown.
 * Surfaced once through the coordinator's `initializationFailed` event.
 */
export class MonitorInitializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MonitorInitializationError';
  }
}
