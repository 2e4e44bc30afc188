// Interview Session Client - Status Reconciler
// After the interviewer leaves, polls the backend until it reports a terminal
// session status or the poll budget runs out. The backend, not the room, says
// when an interview is over.

import { describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { BackendClient } from "./backend-client.js";
import type { PollConfig } from "./config.js";
import { TaskScheduler } from "./scheduler.js";
import type { InterviewOutcome, MessageSink, PollCycle, SessionStatus } from "./types.js";

export const IN_PROGRESS_MESSAGE = "Interview is currently in progress...";
export const STATUS_TIMEOUT_MESSAGE = "Interview status update timed out. Please check manually.";

/** Default per-poll request timeout; polls are spaced by the interval, not bounded by it. */
export const DEFAULT_STATUS_REQUEST_TIMEOUT_MS = 10_000;

const KNOWN_STATUSES: readonly SessionStatus[] = [
  "created",
  "ready",
  "active",
  "interviewing",
  "in-progress",
  "completed",
  "disconnected",
  "failed",
  "error",
];

/** Lowercases and trims a backend status. Unknown strings come back as null. */
export function normalizeSessionStatus(raw: string): SessionStatus | null {
  const value = raw.trim().toLowerCase();
  return KNOWN_STATUSES.find((status) => status === value) ?? null;
}

/** Maps a terminal status to its outcome; non-terminal statuses map to null. */
export function outcomeForStatus(status: SessionStatus | null): InterviewOutcome | null {
  switch (status) {
    case "completed":
      return "completed";
    case "disconnected":
      return "ended";
    case "failed":
    case "error":
      return "failed";
    default:
      return null;
  }
}

function isLiveStatus(status: SessionStatus | null): boolean {
  return status === "active" || status === "interviewing" || status === "in-progress";
}

export interface ReconcilerResult {
  sessionId: string;
  outcome: InterviewOutcome;
  /** Polls made, including failed ones. */
  attempts: number;
}

export interface StatusReconcilerDeps {
  backend: Pick<BackendClient, "getSessionStatus">;
  poll: PollConfig;
  /** Per-request timeout; defaults to DEFAULT_STATUS_REQUEST_TIMEOUT_MS. */
  requestTimeoutMs?: number;
  onOutcome: (result: ReconcilerResult) => void;
  onStillLive?: (sessionId: string) => void;
  onMessage?: MessageSink;
  logger?: Logger;
  scheduler?: TaskScheduler;
}

export class StatusReconciler {
  private readonly deps: StatusReconcilerDeps;
  private readonly logger: Logger;
  private readonly scheduler: TaskScheduler;
  private cycle: PollCycle | null = null;
  /** Bumped on every start and stop; a poll that settles under an older run is ignored. */
  private runId = 0;

  constructor(deps: StatusReconcilerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("StatusReconciler");
    this.scheduler = deps.scheduler ?? new TaskScheduler();
  }

  get running(): boolean {
    return this.cycle !== null;
  }

  get currentCycle(): Readonly<PollCycle> | null {
    return this.cycle ? { ...this.cycle } : null;
  }

  /**
   * Starts a poll cycle for `sessionId`. The first poll fires one interval
   * from now. A cycle already running for the same session is left alone.
   */
  start(sessionId: string): void {
    if (this.cycle?.sessionId === sessionId) {
      this.logger.debug(`Already reconciling session ${sessionId}`);
      return;
    }
    this.stop();
    this.runId++;
    this.cycle = {
      sessionId,
      attempts: 0,
      maxAttempts: this.deps.poll.maxAttempts,
      intervalMs: this.deps.poll.intervalMs,
    };
    this.logger.info(`Reconciling status of session ${sessionId}`);
    this.scheduleNext(this.runId);
  }

  stop(): void {
    if (!this.cycle) return;
    this.runId++;
    this.scheduler.cancelAll();
    this.cycle = null;
  }

  private scheduleNext(runId: number): void {
    const cycle = this.cycle;
    if (!cycle) return;
    this.scheduler.schedule("status-poll", cycle.intervalMs, () => {
      this.poll(runId).catch((err: unknown) => {
        this.logger.error(`Status poll crashed: ${describeError(err)}`);
      });
    });
  }

  private async poll(runId: number): Promise<void> {
    const cycle = this.cycle;
    if (!cycle || runId !== this.runId) return;

    cycle.attempts++;
    let status: SessionStatus | null = null;
    try {
      const raw = await this.deps.backend.getSessionStatus(cycle.sessionId, {
        timeoutMs: this.deps.requestTimeoutMs ?? DEFAULT_STATUS_REQUEST_TIMEOUT_MS,
      });
      status = normalizeSessionStatus(raw);
      this.logger.debug(`Session status: ${raw} (attempt ${cycle.attempts}/${cycle.maxAttempts})`);
    } catch (err) {
      this.logger.warn(`Status poll ${cycle.attempts}/${cycle.maxAttempts} failed: ${describeError(err)}`);
    }
    if (runId !== this.runId) return;

    const outcome = outcomeForStatus(status);
    if (outcome) {
      this.finish({ sessionId: cycle.sessionId, outcome, attempts: cycle.attempts });
      return;
    }
    if (isLiveStatus(status)) {
      this.deps.onMessage?.("voice", { level: "info", text: IN_PROGRESS_MESSAGE });
      this.deps.onStillLive?.(cycle.sessionId);
    }

    if (cycle.attempts >= cycle.maxAttempts) {
      this.logger.warn(`Stopped polling session ${cycle.sessionId} after ${cycle.attempts} attempts`);
      this.deps.onMessage?.("voice", { level: "warning", text: STATUS_TIMEOUT_MESSAGE });
      this.finish({ sessionId: cycle.sessionId, outcome: "unresolved", attempts: cycle.attempts });
      return;
    }
    this.scheduleNext(runId);
  }

  private finish(result: ReconcilerResult): void {
    this.stop();
    this.logger.info(`Session ${result.sessionId} resolved as ${result.outcome} after ${result.attempts} poll(s)`);
    this.deps.onOutcome(result);
  }
}
