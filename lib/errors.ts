/**
 * Error taxonomy shared by transports, the coordinator and transitions.
 *
 * Transports throw these; the coordinator decides what each one means for
 * the device and the cycle (see FleetCoordinator).
 */

export type ConnectionFailureReason = "timeout" | "refused" | "io";

/**
 * Credentials rejected or session expired
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = "AuthError";
  }
}

/**
 * Timeout, refused connection or socket I/O failure
 */
export class ConnectionError extends Error {
  constructor(
    message: string,
    public reason: ConnectionFailureReason = "io",
    public statusCode?: number,
  ) {
    super(message);
    this.name = "ConnectionError";
  }
}

/**
 * Payload could not be understood
 */
export class DecodingError extends Error {
  constructor(
    message: string,
    public payload?: unknown,
  ) {
    super(message);
    this.name = "DecodingError";
  }
}

/**
 * Transition preconditions or form input rejected
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public fieldErrors: Record<string, string> = {},
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * No driver is registered for the requested transport kind
 */
export class TransportNotInstalledError extends Error {
  constructor(public transportKind: string) {
    super(`No driver installed for transport "${transportKind}"`);
    this.name = "TransportNotInstalledError";
  }
}

export class FleetEntryNotFoundError extends Error {
  constructor(public entryId: string) {
    super(`Fleet entry ${entryId} not found`);
    this.name = "FleetEntryNotFoundError";
  }
}

export type PollFailure = AuthError | ConnectionError | DecodingError;

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT"]);
const REFUSED_CODES = new Set([
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Map any thrown value onto the poll failure taxonomy.
 *
 * Unknown errors are treated as decoding failures so they stay isolated to
 * the device that raised them.
 */
export function classifyError(error: unknown): PollFailure {
  if (
    error instanceof AuthError ||
    error instanceof ConnectionError ||
    error instanceof DecodingError
  ) {
    return error;
  }

  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  if (code && TIMEOUT_CODES.has(code)) {
    return new ConnectionError(message, "timeout");
  }
  if (code && REFUSED_CODES.has(code)) {
    return new ConnectionError(message, "refused");
  }
  if (code && code.startsWith("E")) {
    return new ConnectionError(message, "io");
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new ConnectionError(message, "timeout");
  }
  if (error instanceof SyntaxError) {
    return new DecodingError(`Malformed payload: ${message}`);
  }

  return new DecodingError(message);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
