// Interview Session Client - Error taxonomy
// Input errors never leave the form gate, so they have no class here.

import type { SetupStep } from "./types.js";

// ─── Backend transport errors ───────────────────────────────────────────────────

export class BackendRequestError extends Error {
  readonly endpoint: string;
  readonly status: number | null;
  readonly timedOut: boolean;
  /** Error text the backend put in its response body, if any. */
  readonly serverMessage: string | null;

  constructor(
    endpoint: string,
    message: string,
    options: { status?: number; timedOut?: boolean; serverMessage?: string | null; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "BackendRequestError";
    this.endpoint = endpoint;
    this.status = options.status ?? null;
    this.timedOut = options.timedOut ?? false;
    this.serverMessage = options.serverMessage ?? null;
  }
}

// ─── Setup pipeline ─────────────────────────────────────────────────────────────

export class SetupStepError extends Error {
  readonly step: SetupStep;
  readonly timedOut: boolean;

  constructor(step: SetupStep, message: string, timedOut: boolean, cause?: unknown) {
    super(message, { cause });
    this.name = "SetupStepError";
    this.step = step;
    this.timedOut = timedOut;
  }
}

/** A run superseded by cancel(); hosts drop it without showing a failure. */
export class SetupCancelledError extends Error {
  readonly step: SetupStep;

  constructor(step: SetupStep, cause?: unknown) {
    super(`Setup cancelled at step ${step}`, { cause });
    this.name = "SetupCancelledError";
    this.step = step;
  }
}

// ─── Connection failures ────────────────────────────────────────────────────────

export type ConnectionFailureKind =
  | "permission-denied"
  | "device-not-found"
  | "microphone"
  | "invalid-descriptor"
  | "timeout"
  | "transport"
  | "unknown";

export class ConnectionFailure extends Error {
  readonly kind: ConnectionFailureKind;

  constructor(kind: ConnectionFailureKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ConnectionFailure";
    this.kind = kind;
  }
}

const RETRYABLE_KINDS: ReadonlySet<ConnectionFailureKind> = new Set(["timeout", "transport"]);

export function isRetryableFailure(failure: ConnectionFailure): boolean {
  return RETRYABLE_KINDS.has(failure.kind);
}

/** Message fragments that identify transient network-level failures. */
const TRANSPORT_FAILURE_PATTERNS = [
  /network error/i,
  /websocket/i,
  /failed to connect/i,
  /could not establish/i,
  /signal connection/i,
  /fetch failed/i,
];

const TIMEOUT_PATTERN = /timeout|timed out/i;

/**
 * Classifies an error thrown by the transport's connect operation.
 * Timeouts win over other transport wording ("network timeout" is a timeout).
 */
export function classifyTransportError(error: unknown): ConnectionFailure {
  if (error instanceof ConnectionFailure) {
    return error;
  }
  const message = describeError(error);
  if (TIMEOUT_PATTERN.test(message)) {
    return new ConnectionFailure("timeout", message, error);
  }
  if (TRANSPORT_FAILURE_PATTERNS.some((pattern) => pattern.test(message))) {
    return new ConnectionFailure("transport", message, error);
  }
  return new ConnectionFailure("unknown", message, error);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}
