// Interview Session Client - Session Connector
// Turns a SessionDescriptor into a live session: microphone probe, descriptor
// check, bounded connect, bounded publish, advisory track check, backend
// notice. Steps run strictly in that order; the notice is not awaited.

import { ConnectionFailure, classifyTransportError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { BackendClient } from "./backend-client.js";
import type { ConnectorConfig } from "./config.js";
import { classifyMicrophoneError } from "./microphone-probe.js";
import { TaskScheduler } from "./scheduler.js";
import { withTimeout } from "./timeout.js";
import type {
  MicrophoneProbe,
  RealtimeSession,
  RealtimeTransport,
  SessionDescriptor,
  TransportEventListener,
} from "./types.js";

export const LIVE_STATUS = "in-progress";

export interface ConnectedSession {
  session: RealtimeSession;
  unsubscribe: () => void;
  /** Result of the advisory check; false never blocks the interview. */
  localAudioVerified: boolean;
}

export interface ConnectAttempt {
  listener: TransportEventListener;
  /** Owner of this attempt's timers; cancelling it abandons the attempt. */
  scheduler: TaskScheduler;
  /** Called as soon as the session object exists, so the caller can release it on reset. */
  onSessionCreated?: (session: RealtimeSession) => void;
}

export interface SessionConnectorDeps {
  transport: RealtimeTransport;
  probe: MicrophoneProbe;
  backend: Pick<BackendClient, "updateSessionStatus">;
  config: ConnectorConfig;
  statusUpdateTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Checks the descriptor before any network I/O.
 * @throws ConnectionFailure of kind "invalid-descriptor".
 */
export function validateDescriptor(descriptor: SessionDescriptor): void {
  if (!descriptor.transportUrl) {
    throw new ConnectionFailure("invalid-descriptor", "Transport URL is missing from the session descriptor");
  }
  if (!descriptor.token) {
    throw new ConnectionFailure("invalid-descriptor", "Connection token is missing from the session descriptor");
  }
  try {
    new URL(descriptor.transportUrl);
  } catch (err) {
    throw new ConnectionFailure(
      "invalid-descriptor",
      `Invalid transport URL format: ${descriptor.transportUrl} - ${describeError(err)}`,
      err,
    );
  }
}

/**
 * Maps a failed microphone publish onto a connection failure kind.
 */
export function classifyPublishError(error: unknown): ConnectionFailure {
  if (error instanceof ConnectionFailure) {
    return error;
  }
  const message = describeError(error);
  if (/permission|notallowed/i.test(message)) {
    return new ConnectionFailure(
      "permission-denied",
      "Microphone permission denied. Please allow microphone access and refresh the page.",
      error,
    );
  }
  if (/notfound|not found/i.test(message)) {
    return new ConnectionFailure("device-not-found", "No microphone found. Please connect a microphone and try again.", error);
  }
  return new ConnectionFailure("microphone", `Microphone setup failed: ${message}`, error);
}

export class SessionConnector {
  private readonly deps: SessionConnectorDeps;
  private readonly logger: Logger;

  constructor(deps: SessionConnectorDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("SessionConnector");
  }

  /**
   * Establishes a live session. Transport events reach `listener` from the
   * moment the session object exists. On failure the session is released
   * before the ConnectionFailure propagates.
   */
  async connect(descriptor: SessionDescriptor, attempt: ConnectAttempt): Promise<ConnectedSession> {
    const { config } = this.deps;
    const { scheduler } = attempt;

    try {
      await withTimeout(this.deps.probe.probe(), {
        timeoutMs: config.probeTimeoutMs,
        name: "microphone-probe",
        scheduler,
        onTimeout: () =>
          new ConnectionFailure(
            "microphone",
            "Microphone permission request timed out. Please answer the browser prompt and try again.",
          ),
      });
    } catch (err) {
      throw err instanceof ConnectionFailure ? err : classifyMicrophoneError(err);
    }
    this.logger.info("Microphone access granted");

    validateDescriptor(descriptor);

    const session = this.deps.transport.createSession();
    const unsubscribe = session.subscribe(attempt.listener);
    attempt.onSessionCreated?.(session);

    try {
      this.logger.info(`Connecting to ${descriptor.transportUrl} (session ${descriptor.sessionId})`);
      try {
        await withTimeout(session.connect(descriptor.transportUrl, descriptor.token), {
          timeoutMs: config.connectTimeoutMs,
          name: "transport-connect",
          scheduler,
          onTimeout: () => new ConnectionFailure("timeout", "Connection timeout"),
        });
      } catch (err) {
        throw classifyTransportError(err);
      }
      this.logger.info("Connected to real-time session");

      try {
        await withTimeout(session.enableMicrophone(), {
          timeoutMs: config.publishTimeoutMs,
          name: "microphone-publish",
          scheduler,
          onTimeout: () =>
            new ConnectionFailure(
              "timeout",
              "Microphone setup timed out. Please check your microphone permissions and try again.",
            ),
        });
      } catch (err) {
        throw classifyPublishError(err);
      }
      this.logger.info("Microphone published");
    } catch (err) {
      unsubscribe();
      await this.release(session);
      throw err;
    }

    await scheduler.sleep("verify-local-audio", config.verifyDelayMs);
    const localAudioVerified = this.verifyLocalAudio(session);

    // Best-effort; the live state does not wait on it.
    void this.notifyLive(descriptor.sessionId);

    return { session, unsubscribe, localAudioVerified };
  }

  private verifyLocalAudio(session: RealtimeSession): boolean {
    let trackCount = 0;
    try {
      trackCount = session.localAudioTrackCount();
    } catch (err) {
      this.logger.warn(`Local audio verification failed: ${describeError(err)}`);
      return false;
    }
    if (trackCount > 0) {
      this.logger.info(`Microphone verified (${trackCount} local audio track${trackCount === 1 ? "" : "s"})`);
      return true;
    }
    this.logger.warn("No local audio track found after publish; the interviewer may not hear the candidate");
    return false;
  }

  private async notifyLive(sessionId: string): Promise<void> {
    try {
      await this.deps.backend.updateSessionStatus(sessionId, LIVE_STATUS, {
        timeoutMs: this.deps.statusUpdateTimeoutMs,
      });
      this.logger.info(`Backend notified: session ${sessionId} is ${LIVE_STATUS}`);
    } catch (err) {
      this.logger.warn(`Failed to notify backend of connection: ${describeError(err)}`);
    }
  }

  private async release(session: RealtimeSession): Promise<void> {
    try {
      await session.disconnect();
    } catch (err) {
      this.logger.warn(`Error releasing session after failed connect: ${describeError(err)}`);
    }
  }
}
