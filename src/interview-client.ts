// Interview Session Client - Interview Client (host context)
// View model over the whole flow: form → setup → live interview →
// reconciliation → results. Hosts render getSnapshot() and call the
// operations; they never reach into the components.

import { BackendRequestError, SetupStepError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { BackendClient } from "./backend-client.js";
import type { InterviewClientConfig } from "./config.js";
import { SILENT_LEVELS } from "./audio-level-monitor.js";
import { CompletionDispatcher } from "./completion-dispatcher.js";
import { ConnectionSupervisor } from "./connection-supervisor.js";
import type { DisconnectCause, SupervisorSnapshot } from "./connection-supervisor.js";
import { FormGate, validateForm } from "./form-gate.js";
import { SessionConnector } from "./session-connector.js";
import { SetupPipeline } from "./setup-pipeline.js";
import { StatusReconciler } from "./status-reconciler.js";
import type { ReconcilerResult } from "./status-reconciler.js";
import { TaskScheduler } from "./scheduler.js";
import { ConnectionState } from "./types.js";
import type {
  AttachedFile,
  AttachmentField,
  AudioLevels,
  CandidateFormValues,
  FormValidation,
  InterviewOutcome,
  MessageChannel,
  MicrophoneProbe,
  RealtimeTransport,
  ReportSink,
  SessionDescriptor,
  SetupProgress,
  SystemStatus,
  UserMessage,
  ViewSection,
} from "./types.js";

export const USER_DISCONNECT_MESSAGE = "You have disconnected from the interview.";
export const CONNECTION_LOST_MESSAGE =
  "Connection to interview room was lost. You can reconnect or the interview may be complete.";

export interface InterviewProgress {
  /** Zero-based index of the current question. */
  current: number;
  total: number;
}

/** What the host renders. The connection credential is never exposed. */
export interface InterviewClientSnapshot {
  section: ViewSection;
  messages: Partial<Record<MessageChannel, UserMessage>>;
  form: FormValidation;
  setupProgress: SetupProgress | null;
  sessionId: string | null;
  candidateName: string | null;
  connection: SupervisorSnapshot;
  interviewProgress: InterviewProgress | null;
  audioLevels: AudioLevels;
  reconciling: boolean;
  outcome: InterviewOutcome | null;
  systemStatus: SystemStatus;
}

export type InterviewClientListener = (snapshot: InterviewClientSnapshot) => void;

export interface InterviewClientDeps {
  config: InterviewClientConfig;
  backend: BackendClient;
  transport: RealtimeTransport;
  probe: MicrophoneProbe;
  reportSink: ReportSink;
  /** Shared by every component when given; otherwise each gets its own console logger. */
  logger?: Logger;
  now?: () => Date;
}

export class InterviewClient {
  private readonly deps: InterviewClientDeps;
  private readonly logger: Logger;
  private readonly scheduler = new TaskScheduler();
  private readonly listeners = new Set<InterviewClientListener>();

  private readonly gate: FormGate;
  private readonly pipeline: SetupPipeline;
  private readonly supervisor: ConnectionSupervisor;
  private readonly reconciler: StatusReconciler;
  private readonly dispatcher: CompletionDispatcher;

  private section: ViewSection = "setup";
  private messages: Partial<Record<MessageChannel, UserMessage>> = {};
  private form: FormValidation;
  private setupProgress: SetupProgress | null = null;
  private descriptor: SessionDescriptor | null = null;
  private connection: SupervisorSnapshot;
  private interviewProgress: InterviewProgress | null = null;
  private audioLevels: AudioLevels = SILENT_LEVELS;
  private outcome: InterviewOutcome | null = null;
  private systemStatus: SystemStatus = "unknown";
  /** Bumped by startNewInterview; a setup run that settles under an older run is discarded. */
  private runId = 0;

  constructor(deps: InterviewClientDeps) {
    this.deps = deps;
    const { config } = deps;
    const loggerFor = (component: string) => deps.logger ?? createLogger(component);
    this.logger = loggerFor("InterviewClient");
    const post = (channel: MessageChannel, message: UserMessage) => this.post(channel, message);

    this.gate = new FormGate({
      debounceMs: config.validationDebounceMs,
      maxFileSizeBytes: config.maxFileSizeBytes,
      onValidation: (validation) => {
        this.form = validation;
        this.emit();
      },
      onMessage: post,
    });
    this.form = validateForm(this.gate.snapshot, config.maxFileSizeBytes);

    this.pipeline = new SetupPipeline({
      backend: deps.backend,
      timeouts: config.steps,
      questionCount: config.questionCount,
      logger: loggerFor("SetupPipeline"),
      now: deps.now,
    });

    this.supervisor = new ConnectionSupervisor({
      connector: new SessionConnector({
        transport: deps.transport,
        probe: deps.probe,
        backend: deps.backend,
        config: config.connector,
        statusUpdateTimeoutMs: config.statusUpdateTimeoutMs,
        logger: loggerFor("SessionConnector"),
      }),
      retry: config.retry,
      audioLevelIntervalMs: config.audioLevelIntervalMs,
      onMessage: post,
      onLevels: (levels) => {
        this.audioLevels = levels;
        this.emit();
      },
      onInterviewerLeft: (sessionId) => this.reconcile(sessionId),
      onDisconnected: (cause) => this.onDisconnected(cause),
      logger: loggerFor("ConnectionSupervisor"),
    });
    this.connection = this.supervisor.snapshot;
    this.supervisor.onStateChange((snapshot) => this.onConnectionChange(snapshot));

    this.reconciler = new StatusReconciler({
      backend: deps.backend,
      poll: config.poll,
      requestTimeoutMs: config.statusUpdateTimeoutMs,
      onOutcome: (result) => this.onReconciled(result),
      onMessage: post,
      logger: loggerFor("StatusReconciler"),
    });

    this.dispatcher = new CompletionDispatcher({
      backend: deps.backend,
      sink: deps.reportSink,
      reportTimeoutMs: config.reportTimeoutMs,
      resultsDelayMs: config.resultsDelayMs,
      onShowResults: () => this.showSection("results"),
      onMessage: post,
      logger: loggerFor("CompletionDispatcher"),
    });
  }

  // ─── Snapshot ───────────────────────────────────────────────────────────────

  getSnapshot(): InterviewClientSnapshot {
    return {
      section: this.section,
      messages: { ...this.messages },
      form: this.form,
      setupProgress: this.setupProgress,
      sessionId: this.descriptor?.sessionId ?? null,
      candidateName: this.descriptor?.candidateName ?? null,
      connection: this.connection,
      interviewProgress: this.interviewProgress,
      audioLevels: this.audioLevels,
      reconciling: this.reconciler.running,
      outcome: this.outcome,
      systemStatus: this.systemStatus,
    };
  }

  subscribe(listener: InterviewClientListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ─── Form ───────────────────────────────────────────────────────────────────

  updateForm(patch: Partial<Pick<CandidateFormValues, "name" | "position" | "email">>): void {
    this.gate.update(patch);
  }

  attachFile(field: AttachmentField, file: AttachedFile | null): boolean {
    return this.gate.attach(field, file);
  }

  // ─── Setup ──────────────────────────────────────────────────────────────────

  /**
   * Runs the setup pipeline for the current form. On success the view moves
   * to the interview and a connection starts after the auto-connect delay.
   * @returns The descriptor, or null when setup did not complete.
   */
  async submitSetup(): Promise<SessionDescriptor | null> {
    this.form = this.gate.validateNow();
    const form = this.gate.validated();
    if (!form) {
      this.post("setup", { level: "danger", text: "Please complete all required fields." });
      return null;
    }
    if (this.section === "processing") {
      this.logger.warn("Setup already running; ignoring submit");
      return null;
    }

    const runId = ++this.runId;
    delete this.messages.setup;
    this.setupProgress = null;
    this.showSection("processing");

    let descriptor: SessionDescriptor;
    try {
      descriptor = await this.pipeline.run(form, (progress) => {
        if (runId !== this.runId) return;
        this.setupProgress = progress;
        this.emit();
      });
    } catch (err) {
      if (runId !== this.runId) return null;
      const message = err instanceof SetupStepError ? err.message : describeError(err);
      this.logger.error(`Setup failed: ${message}`);
      this.messages.setup = { level: "danger", text: `Setup failed: ${message}` };
      this.showSection("setup");
      return null;
    }
    if (runId !== this.runId) return null;

    this.descriptor = descriptor;
    this.supervisor.prepare(descriptor);
    this.interviewProgress = { current: 0, total: descriptor.questions.length };
    this.showSection("voice");
    this.scheduler.schedule("auto-connect", this.deps.config.autoConnectDelayMs, () => this.connect());
    return descriptor;
  }

  // ─── Live session ───────────────────────────────────────────────────────────

  connect(): void {
    this.supervisor.connect();
  }

  disconnect(): void {
    this.supervisor.disconnect();
  }

  async startAudio(): Promise<void> {
    try {
      await this.supervisor.startAudio();
    } catch (err) {
      this.logger.warn(`Could not start audio playback: ${describeError(err)}`);
      this.post("voice", { level: "warning", text: `Could not start audio playback: ${describeError(err)}` });
    }
  }

  // ─── Results ────────────────────────────────────────────────────────────────

  /** Downloads the report of the current session. Returns where it landed, or null. */
  async downloadReport(): Promise<string | null> {
    const sessionId = this.descriptor?.sessionId;
    if (!sessionId) {
      this.post("results", { level: "danger", text: "No session data available for report generation." });
      return null;
    }
    return this.dispatcher.downloadReport(sessionId);
  }

  /** Reads backend health: ready, degraded, timeout or unreachable. */
  async checkSystemStatus(): Promise<SystemStatus> {
    let status: SystemStatus;
    try {
      const health = await this.deps.backend.checkHealth({ timeoutMs: this.deps.config.healthTimeoutMs });
      status = health.healthy ? "ready" : "degraded";
      if (health.healthy && !health.transportConnected) {
        this.logger.warn("Backend is healthy but reports no real-time service connection");
      }
    } catch (err) {
      status = err instanceof BackendRequestError && err.timedOut ? "timeout" : "unreachable";
      this.logger.warn(`System status check failed: ${describeError(err)}`);
    }
    this.systemStatus = status;
    this.emit();
    return status;
  }

  /**
   * Returns to an empty form: cancels every timer, stops polling, releases
   * the session and clears all interview state.
   */
  startNewInterview(): void {
    this.logger.info("Starting new interview");
    this.teardown();
    this.gate.reset();
    this.descriptor = null;
    this.setupProgress = null;
    this.interviewProgress = null;
    this.audioLevels = SILENT_LEVELS;
    this.outcome = null;
    this.messages = {};
    this.showSection("setup");
  }

  /** Stops every component without touching the view; for hosts shutting down. */
  dispose(): void {
    this.teardown();
    this.listeners.clear();
  }

  // ─── Component callbacks ────────────────────────────────────────────────────

  private reconcile(sessionId: string): void {
    this.reconciler.start(sessionId);
    this.emit();
  }

  private onConnectionChange(snapshot: SupervisorSnapshot): void {
    const previous = this.connection.state;
    this.connection = snapshot;
    if (previous !== ConnectionState.CONNECTED && snapshot.state === ConnectionState.CONNECTED) {
      delete this.messages.voice;
    }
    this.emit();
  }

  private onDisconnected(cause: DisconnectCause): void {
    const sessionId = this.descriptor?.sessionId;
    if (cause.initiatedBy === "user") {
      this.post("voice", { level: "info", text: USER_DISCONNECT_MESSAGE });
      if (sessionId) this.reconcile(sessionId);
      return;
    }
    if (this.reconciler.running) {
      return;
    }
    this.post("voice", { level: "warning", text: CONNECTION_LOST_MESSAGE });
    this.scheduler.schedule("disconnect-results", this.deps.config.disconnectResultsDelayMs, () =>
      this.showSection("results"),
    );
  }

  private onReconciled(result: ReconcilerResult): void {
    this.outcome = result.outcome;
    this.emit();
    this.dispatcher.handleOutcome(result.sessionId, result.outcome);
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private teardown(): void {
    this.runId++;
    this.scheduler.cancelAll();
    this.pipeline.cancel();
    this.reconciler.stop();
    this.dispatcher.cancel();
    this.supervisor.reset();
  }

  private showSection(section: ViewSection): void {
    if (section !== this.section) {
      this.logger.debug(`Switching to section: ${section}`);
    }
    this.section = section;
    this.emit();
  }

  private post(channel: MessageChannel, message: UserMessage): void {
    this.messages[channel] = message;
    this.emit();
  }

  private emit(): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.getSnapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this.logger.error(`Snapshot listener threw: ${describeError(err)}`);
      }
    }
  }
}
