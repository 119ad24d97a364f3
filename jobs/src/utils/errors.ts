export const InvalidArgumentCode = {
  INVALID_GRID_SIZE: "INVALID_GRID_SIZE",
  INVALID_RADIUS: "INVALID_RADIUS",
  INVALID_CENTER: "INVALID_CENTER",
  INVALID_FILTER: "INVALID_FILTER",
  INVALID_DATE: "INVALID_DATE",
  INVALID_PAGING: "INVALID_PAGING",
} as const;

export type InvalidArgumentCode =
  (typeof InvalidArgumentCode)[keyof typeof InvalidArgumentCode];

/** Bad search input. Raised before any request goes out. */
export class InvalidArgumentError extends Error {
  readonly code: InvalidArgumentCode;

  constructor(code: InvalidArgumentCode, message: string) {
    super(message);
    this.name = "InvalidArgumentError";
    this.code = code;
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Extract comprehensive error details including the full cause chain.
 * Fetch errors in Node wrap the real error (ECONNREFUSED, DNS, TLS, etc.)
 * in `cause`, so we need to unwrap it to get anything useful.
 */
export function extractError(err: unknown): {
  message: string;
  type: string;
  stack: string | undefined;
  cause: string | undefined;
  fullMessage: string;
} {
  if (!(err instanceof Error)) {
    const msg = String(err);
    return { message: msg, type: typeof err, stack: undefined, cause: undefined, fullMessage: msg };
  }

  const causeChain = unwrapCauses(err);
  const causeStr = causeChain.length > 0 ? causeChain.join(" → ") : undefined;

  // fullMessage: "Parcel query request failed → [Error] connect ECONNREFUSED"
  const fullMessage = causeStr ? `${err.message} → ${causeStr}` : err.message;

  return {
    message: err.message,
    type: err.name,
    stack: err.stack,
    cause: causeStr,
    fullMessage,
  };
}

function unwrapCauses(err: Error): string[] {
  const parts: string[] = [];
  let current: unknown = err.cause;
  const seen = new Set<unknown>();

  while (current && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      parts.push(`[${current.name}] ${current.message}`);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts;
}
