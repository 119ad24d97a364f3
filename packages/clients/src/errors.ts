/**
 * Raised when a layer query cannot produce a feature list: transport error,
 * non-2xx status, a backend `error` payload or a malformed body.
 */
export class ParcelQueryError extends Error {
  /** HTTP status, or null when the failure happened before/after the exchange */
  readonly status: number | null;
  /** Message reported by the backend, when it sent one */
  readonly backendMessage: string | null;

  constructor(
    message: string,
    options: { status?: number | null; backendMessage?: string | null; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "ParcelQueryError";
    this.status = options.status ?? null;
    this.backendMessage = options.backendMessage ?? null;
    Object.setPrototypeOf(this, ParcelQueryError.prototype);
  }
}
