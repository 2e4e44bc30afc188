// Interview Session Client - Connection Supervisor
// Sole owner of ConnectionState, the RetryBudget, the prepared descriptor and
// the live session handle. Every transition goes through dispatch().
//
// State machine:
//   idle | disconnected | error → connecting        (connect-requested)
//   connecting → connecting                         (retryable failure or room lost mid-attempt, budget left)
//   connecting → connected                          (attempt-succeeded)
//   connecting → error                              (terminal failure or budget spent)
//   connected ↔ reconnecting                        (transport reconnecting / reconnected)
//   connecting | connected | reconnecting → disconnected   (transport loss, user disconnect)
//   any → idle                                      (reset)

import { ConnectionFailure, classifyTransportError, describeError, isRetryableFailure } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { AudioLevelMonitor } from "./audio-level-monitor.js";
import type { RetryConfig } from "./config.js";
import type { ConnectedSession, SessionConnector } from "./session-connector.js";
import { TaskScheduler } from "./scheduler.js";
import { ConnectionState } from "./types.js";
import type {
  AudioLevels,
  ConnectionQuality,
  MessageSink,
  RealtimeSession,
  RetryBudget,
  SessionDescriptor,
  TransportEvent,
  UserMessage,
} from "./types.js";

// ─── Events ─────────────────────────────────────────────────────────────────────

/**
 * Everything that can move the supervisor. Events carrying a generation were
 * produced by one connect attempt; they are dropped once that attempt has been
 * superseded by a reset or a user disconnect.
 */
export type SupervisorEvent =
  | { type: "connect-requested" }
  | { type: "attempt-succeeded"; generation: number; connected: ConnectedSession }
  | { type: "attempt-failed"; generation: number; failure: ConnectionFailure }
  | { type: "retry-due"; generation: number }
  | { type: "transport"; generation: number; event: TransportEvent }
  | { type: "disconnect-requested" }
  | { type: "reset" };

export type DisconnectCause = { initiatedBy: "user" } | { initiatedBy: "transport"; reason: string };

export interface SupervisorSnapshot {
  state: ConnectionState;
  statusText: string;
  retry: Readonly<RetryBudget>;
  sessionId: string | null;
  interviewerIdentity: string | null;
  interviewerAudio: boolean;
  interviewerVideo: boolean;
  quality: ConnectionQuality;
  audioPlaybackBlocked: boolean;
  localAudioVerified: boolean;
}

export type SupervisorListener = (snapshot: SupervisorSnapshot) => void;

export interface ConnectionSupervisorDeps {
  connector: Pick<SessionConnector, "connect">;
  retry: RetryConfig;
  audioLevelIntervalMs: number;
  onMessage?: MessageSink;
  onLevels?: (levels: AudioLevels) => void;
  /** The interviewer left the room; the host decides whether the interview is over. */
  onInterviewerLeft?: (sessionId: string) => void;
  /** A live session ended, either by the user or by the transport. */
  onDisconnected?: (cause: DisconnectCause) => void;
  logger?: Logger;
  scheduler?: TaskScheduler;
}

export const INTERVIEWER_JOINED_MESSAGE = "AI interviewer has joined! The interview will begin shortly.";
export const INTERVIEWER_LEFT_MESSAGE = "AI interviewer has finished. Checking interview status...";
export const ENABLE_AUDIO_MESSAGE = "Click here to enable AI interviewer audio";

const RESETTABLE_STATES: ReadonlySet<ConnectionState> = new Set([
  ConnectionState.IDLE,
  ConnectionState.DISCONNECTED,
  ConnectionState.ERROR,
]);

const LIVE_STATES: ReadonlySet<ConnectionState> = new Set([ConnectionState.CONNECTED, ConnectionState.RECONNECTING]);

/**
 * User-facing text for a connection that will not be retried, with guidance
 * for the two causes the candidate can act on.
 */
export function remediationMessage(failure: ConnectionFailure): string {
  const base = `Failed to connect: ${failure.message}`;
  switch (failure.kind) {
    case "permission-denied":
    case "device-not-found":
    case "microphone":
      return (
        `${base}\n\nMicrophone issues:\n` +
        "• Check that a microphone is connected\n" +
        "• Allow microphone permissions in the browser\n" +
        "• Try refreshing the page"
      );
    case "timeout":
      return (
        `${base}\n\nConnection timeout:\n` +
        "• Check your internet connection\n" +
        "• Try refreshing the page\n" +
        "• Contact support if the issue persists"
      );
    default:
      return base;
  }
}

// ─── Supervisor ─────────────────────────────────────────────────────────────────

export class ConnectionSupervisor {
  private readonly deps: ConnectionSupervisorDeps;
  private readonly logger: Logger;
  private readonly scheduler: TaskScheduler;
  private readonly monitor: AudioLevelMonitor;
  private readonly listeners = new Set<SupervisorListener>();

  private state = ConnectionState.IDLE;
  private statusText = "Ready to connect";
  private readonly retry: RetryBudget;
  private descriptor: SessionDescriptor | null = null;
  private session: RealtimeSession | null = null;
  private unsubscribe: (() => void) | null = null;
  /** Bumped on reset, user disconnect and a room lost mid-attempt; events from older attempts are stale. */
  private generation = 0;

  private interviewerIdentity: string | null = null;
  private interviewerAudio = false;
  private interviewerVideo = false;
  private quality: ConnectionQuality = "unknown";
  private audioPlaybackBlocked = false;
  private localAudioVerified = false;

  constructor(deps: ConnectionSupervisorDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("ConnectionSupervisor");
    this.scheduler = deps.scheduler ?? new TaskScheduler();
    this.retry = { attempts: 0, maxAttempts: deps.retry.maxAttempts, baseDelayMs: deps.retry.baseDelayMs };
    this.monitor = new AudioLevelMonitor({
      scheduler: this.scheduler,
      intervalMs: deps.audioLevelIntervalMs,
      onLevels: (levels) => this.deps.onLevels?.(levels),
      logger: this.logger,
    });
  }

  // ─── Public operations ──────────────────────────────────────────────────────

  get snapshot(): SupervisorSnapshot {
    return {
      state: this.state,
      statusText: this.statusText,
      retry: { ...this.retry },
      sessionId: this.descriptor?.sessionId ?? null,
      interviewerIdentity: this.interviewerIdentity,
      interviewerAudio: this.interviewerAudio,
      interviewerVideo: this.interviewerVideo,
      quality: this.quality,
      audioPlaybackBlocked: this.audioPlaybackBlocked,
      localAudioVerified: this.localAudioVerified,
    };
  }

  get pendingTimers(): number {
    return this.scheduler.activeCount;
  }

  onStateChange(listener: SupervisorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Hands the supervisor the descriptor every attempt (and reconnect) will use. */
  prepare(descriptor: SessionDescriptor): void {
    if (this.descriptor && this.descriptor.sessionId !== descriptor.sessionId && !RESETTABLE_STATES.has(this.state)) {
      throw new Error("Cannot replace the session descriptor while a connection is active");
    }
    this.descriptor = descriptor;
    this.emit();
  }

  connect(): void {
    this.dispatch({ type: "connect-requested" });
  }

  disconnect(): void {
    this.dispatch({ type: "disconnect-requested" });
  }

  reset(): void {
    this.dispatch({ type: "reset" });
  }

  /** Resumes playback after the host blocked autoplay. */
  async startAudio(): Promise<void> {
    if (!this.session) {
      return;
    }
    await this.session.startAudio();
    this.audioPlaybackBlocked = false;
    this.emit();
  }

  dispatch(event: SupervisorEvent): void {
    if ("generation" in event && event.generation !== this.generation) {
      this.dropStale(event);
      return;
    }

    switch (event.type) {
      case "connect-requested":
        this.onConnectRequested();
        break;
      case "attempt-succeeded":
        this.onAttemptSucceeded(event.connected);
        break;
      case "attempt-failed":
        this.onAttemptFailed(event.failure);
        break;
      case "retry-due":
        if (this.state === ConnectionState.CONNECTING) {
          this.startAttempt();
        }
        break;
      case "transport":
        this.onTransportEvent(event.event);
        break;
      case "disconnect-requested":
        this.onDisconnectRequested();
        break;
      case "reset":
        this.onReset();
        break;
    }
  }

  // ─── Transitions ────────────────────────────────────────────────────────────

  private onConnectRequested(): void {
    if (!RESETTABLE_STATES.has(this.state)) {
      this.logger.warn(`Connect requested while ${this.state}; ignoring`);
      return;
    }
    if (!this.descriptor) {
      this.post({ level: "danger", text: "No interview session is available. Please complete setup first." });
      return;
    }
    this.retry.attempts = 0;
    this.startAttempt();
  }

  private startAttempt(): void {
    const descriptor = this.descriptor;
    if (!descriptor) {
      return;
    }
    this.retry.attempts++;
    const generation = this.generation;
    const { attempts, maxAttempts } = this.retry;
    this.logger.info(`Connection attempt ${attempts}/${maxAttempts} for session ${descriptor.sessionId}`);
    this.setState(
      ConnectionState.CONNECTING,
      attempts === 1 ? "Connecting to interview room..." : `Connecting to interview room (attempt ${attempts}/${maxAttempts})...`,
    );

    this.deps.connector
      .connect(descriptor, {
        listener: (event) => this.dispatch({ type: "transport", generation, event }),
        scheduler: this.scheduler,
        onSessionCreated: (session) => {
          if (generation === this.generation) {
            this.session = session;
          } else {
            this.release(session);
          }
        },
      })
      .then(
        (connected) => this.dispatch({ type: "attempt-succeeded", generation, connected }),
        (err: unknown) => this.dispatch({ type: "attempt-failed", generation, failure: classifyTransportError(err) }),
      );
  }

  private onAttemptSucceeded(connected: ConnectedSession): void {
    if (this.state !== ConnectionState.CONNECTING || !this.descriptor) {
      connected.unsubscribe();
      this.release(connected.session);
      return;
    }
    this.session = connected.session;
    this.unsubscribe = connected.unsubscribe;
    this.localAudioVerified = connected.localAudioVerified;
    this.retry.attempts = 0;
    this.logger.info(`Connected to session ${this.descriptor.sessionId}`);
    this.setState(ConnectionState.CONNECTED, "Connected to interview");
    this.monitor.start(connected.session, this.descriptor.candidateName);
  }

  private onAttemptFailed(failure: ConnectionFailure): void {
    // The connector has already released whatever it created.
    this.session = null;
    if (this.state !== ConnectionState.CONNECTING) {
      return;
    }

    const { attempts, maxAttempts, baseDelayMs } = this.retry;
    if (isRetryableFailure(failure) && attempts < maxAttempts) {
      const delayMs = baseDelayMs * attempts;
      const generation = this.generation;
      this.logger.warn(`Attempt ${attempts}/${maxAttempts} failed (${failure.kind}): ${failure.message}; retrying in ${delayMs}ms`);
      this.setState(ConnectionState.CONNECTING, `Connection failed, retrying... (${attempts}/${maxAttempts})`);
      this.scheduler.schedule("connect-retry", delayMs, () => this.dispatch({ type: "retry-due", generation }));
      return;
    }

    this.logger.error(`Connection failed after ${attempts} attempt(s) (${failure.kind}): ${failure.message}`);
    this.retry.attempts = 0;
    this.setState(ConnectionState.ERROR, `Connection failed: ${failure.message}`);
    this.post({ level: "danger", text: remediationMessage(failure) });
  }

  private onTransportEvent(event: TransportEvent): void {
    switch (event.type) {
      case "participantConnected":
        if (!this.isInterviewer(event.identity)) return;
        this.interviewerIdentity = event.identity;
        this.logger.info(`Interviewer joined: ${event.identity}`);
        this.statusText = "AI interviewer connected - Interview starting";
        this.post({ level: "success", text: INTERVIEWER_JOINED_MESSAGE });
        this.emit();
        return;

      case "participantDisconnected": {
        if (!this.isInterviewer(event.identity) || !LIVE_STATES.has(this.state)) return;
        const sessionId = this.descriptor?.sessionId;
        this.logger.info(`Interviewer left: ${event.identity}`);
        this.monitor.stop();
        this.interviewerIdentity = null;
        this.interviewerAudio = false;
        this.interviewerVideo = false;
        this.statusText = "Checking interview status...";
        this.post({ level: "info", text: INTERVIEWER_LEFT_MESSAGE });
        this.emit();
        if (sessionId) {
          this.deps.onInterviewerLeft?.(sessionId);
        }
        return;
      }

      case "trackSubscribed":
      case "trackUnsubscribed": {
        if (!this.isInterviewer(event.identity)) return;
        const present = event.type === "trackSubscribed";
        if (event.kind === "audio") {
          this.interviewerAudio = present;
        } else {
          this.interviewerVideo = present;
        }
        this.emit();
        return;
      }

      case "reconnecting":
        if (this.state === ConnectionState.CONNECTED) {
          this.setState(ConnectionState.RECONNECTING, "Reconnecting to interview room...");
        }
        return;

      case "reconnected":
        if (this.state === ConnectionState.RECONNECTING) {
          this.setState(ConnectionState.CONNECTED, "Reconnected to interview room");
        }
        return;

      case "connectionQualityChanged":
        if (!event.local) return;
        this.quality = event.quality;
        this.emit();
        return;

      case "audioPlaybackChanged":
        this.audioPlaybackBlocked = !event.canPlayback;
        if (this.audioPlaybackBlocked) {
          this.post({ level: "info", text: ENABLE_AUDIO_MESSAGE, action: () => this.resumeAudio() });
        }
        this.emit();
        return;

      case "disconnected":
        if (this.state === ConnectionState.CONNECTING && this.session) {
          this.onLostWhileConnecting(event.reason);
          return;
        }
        if (!LIVE_STATES.has(this.state)) return;
        this.logger.warn(`Transport disconnected: ${event.reason}`);
        this.teardown();
        this.setState(ConnectionState.DISCONNECTED, "Disconnected from interview room");
        this.deps.onDisconnected?.({ initiatedBy: "transport", reason: event.reason });
        return;
    }
  }

  /**
   * The room closed after it was opened but before the attempt finished. The
   * attempt is superseded, so its eventual success is dropped as stale, and the
   * loss goes through the retry policy as a transport failure.
   */
  private onLostWhileConnecting(reason: string): void {
    this.logger.warn(`Transport disconnected while connecting: ${reason}`);
    this.generation++;
    this.teardown();
    this.onAttemptFailed(new ConnectionFailure("transport", `Connection lost while connecting: ${reason}`));
  }

  private onDisconnectRequested(): void {
    const previous = this.state;
    if (previous !== ConnectionState.CONNECTING && !LIVE_STATES.has(previous)) {
      return;
    }
    this.generation++;
    this.scheduler.cancelAll();
    this.teardown();
    this.retry.attempts = 0;
    this.setState(ConnectionState.DISCONNECTED, "Disconnected");
    if (LIVE_STATES.has(previous)) {
      this.deps.onDisconnected?.({ initiatedBy: "user" });
    }
  }

  private onReset(): void {
    this.generation++;
    this.scheduler.cancelAll();
    this.teardown();
    this.descriptor = null;
    this.retry.attempts = 0;
    this.interviewerIdentity = null;
    this.interviewerAudio = false;
    this.interviewerVideo = false;
    this.quality = "unknown";
    this.audioPlaybackBlocked = false;
    this.localAudioVerified = false;
    this.setState(ConnectionState.IDLE, "Ready to connect");
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  /** Stops sampling, detaches the listener and releases the session handle. */
  private teardown(): void {
    this.monitor.stop();
    this.unsubscribe?.();
    this.unsubscribe = null;
    const session = this.session;
    this.session = null;
    if (session) {
      this.release(session);
    }
  }

  private release(session: RealtimeSession): void {
    session.disconnect().catch((err: unknown) => {
      this.logger.warn(`Error releasing session: ${describeError(err)}`);
    });
  }

  private dropStale(event: SupervisorEvent): void {
    this.logger.debug(`Ignoring stale ${event.type} event`);
    if (event.type === "attempt-succeeded") {
      event.connected.unsubscribe();
      this.release(event.connected.session);
    }
  }

  private resumeAudio(): void {
    this.startAudio().catch((err: unknown) => {
      this.logger.warn(`Could not start audio playback: ${describeError(err)}`);
      this.post({ level: "warning", text: `Could not start audio playback: ${describeError(err)}` });
    });
  }

  private isInterviewer(identity: string): boolean {
    return identity !== "" && identity !== "unknown" && identity !== this.descriptor?.candidateName;
  }

  private post(message: UserMessage): void {
    this.deps.onMessage?.("voice", message);
  }

  private setState(state: ConnectionState, statusText: string): void {
    if (state !== this.state) {
      this.logger.debug(`${this.state} → ${state}`);
    }
    this.state = state;
    this.statusText = statusText;
    this.emit();
  }

  private emit(): void {
    const snapshot = this.snapshot;
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this.logger.error(`State listener threw: ${describeError(err)}`);
      }
    }
  }
}
