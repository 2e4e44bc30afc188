// Interview Session Client - Shared TypeScript interfaces and types
// Runtime code stays out of this barrel; helpers live beside the components
// that own them.

// ─── Connection State Machine ───────────────────────────────────────────────────

export enum ConnectionState {
  IDLE = "idle",
  CONNECTING = "connecting",
  CONNECTED = "connected",
  RECONNECTING = "reconnecting",
  DISCONNECTED = "disconnected",
  ERROR = "error",
}

// ─── Session Descriptor ─────────────────────────────────────────────────────────

/**
 * Everything needed to join one real-time interview session.
 * Frozen on creation; reconnects reuse the same descriptor.
 */
export interface SessionDescriptor {
  readonly sessionId: string;
  readonly candidateName: string;
  readonly questions: readonly string[];
  readonly transportUrl: string;
  /** Single-use connection credential minted by create-session. */
  readonly token: string;
  readonly roomName: string | null;
  readonly createdAt: Date;
}

// ─── Backend Session Status ─────────────────────────────────────────────────────

export type LiveSessionStatus = "active" | "interviewing" | "in-progress";

export type TerminalSessionStatus = "completed" | "disconnected" | "failed" | "error";

export type SessionStatus = "created" | "ready" | LiveSessionStatus | TerminalSessionStatus;

// ─── Budgets ────────────────────────────────────────────────────────────────────

export interface RetryBudget {
  attempts: number;
  maxAttempts: number;
  baseDelayMs: number;
}

export interface PollCycle {
  sessionId: string;
  attempts: number;
  maxAttempts: number;
  intervalMs: number;
}

// ─── Candidate Form ─────────────────────────────────────────────────────────────

export interface AttachedFile {
  name: string;
  /** Size in bytes. */
  size: number;
  content: Blob;
}

export type AttachmentField = "jobDescription" | "resume";

export interface CandidateFormValues {
  name: string;
  position: string;
  email: string;
  jobDescription: AttachedFile | null;
  resume: AttachedFile | null;
}

export type FormField = "name" | "position" | "email" | AttachmentField;

export interface FormFieldError {
  field: FormField;
  message: string;
}

export interface FormValidation {
  valid: boolean;
  submitDisabled: boolean;
  submitLabel: string;
  errors: FormFieldError[];
}

/** Form values that passed the gate. Attachments are guaranteed present. */
export interface ValidatedCandidateForm {
  name: string;
  position: string;
  email: string;
  jobDescription: AttachedFile;
  resume: AttachedFile;
}

// ─── Setup Pipeline ─────────────────────────────────────────────────────────────

export type SetupStep = "upload" | "analyze" | "generate-questions" | "create-session";

export interface SetupProgress {
  percent: number;
  label: string;
  detail: string;
}

// ─── UI Model ───────────────────────────────────────────────────────────────────

export type ViewSection = "setup" | "processing" | "voice" | "results";

export type MessageChannel = "setup" | "voice" | "results";

export type MessageLevel = "success" | "danger" | "warning" | "info";

export interface UserMessage {
  level: MessageLevel;
  text: string;
  /** Present when the message is clickable (e.g. resume blocked audio playback). */
  action?: () => void;
}

export type MessageSink = (channel: MessageChannel, message: UserMessage) => void;

export type ConnectionQuality = "excellent" | "good" | "poor" | "lost" | "unknown";

export type MicLevelBand = "low" | "medium" | "high";

export interface AudioLevels {
  /** 0..100 */
  microphone: number;
  /** 0..100, loudest remote interviewer participant */
  interviewer: number;
  microphoneBand: MicLevelBand;
}

export type InterviewOutcome = "completed" | "ended" | "failed" | "unresolved";

export type SystemStatus = "unknown" | "ready" | "degraded" | "timeout" | "unreachable";

// ─── Real-time Transport ────────────────────────────────────────────────────────

export type MediaKind = "audio" | "video";

export type TransportEvent =
  | { type: "participantConnected"; identity: string }
  | { type: "participantDisconnected"; identity: string }
  | { type: "trackSubscribed"; kind: MediaKind; identity: string }
  | { type: "trackUnsubscribed"; kind: MediaKind; identity: string }
  | { type: "disconnected"; reason: string }
  | { type: "reconnecting" }
  | { type: "reconnected" }
  | { type: "connectionQualityChanged"; quality: ConnectionQuality; local: boolean }
  | { type: "audioPlaybackChanged"; canPlayback: boolean };

export type TransportEventListener = (event: TransportEvent) => void;

export interface ParticipantAudioLevel {
  identity: string;
  /** 0..1 as reported by the transport */
  level: number;
}

/**
 * One real-time session. Implementations: the LiveKit adapter in production,
 * in-process fakes in tests.
 */
export interface RealtimeSession {
  connect(url: string, token: string): Promise<void>;
  enableMicrophone(): Promise<void>;
  /** Number of local audio tracks that currently carry a media track. */
  localAudioTrackCount(): number;
  localAudioLevel(): number;
  remoteAudioLevels(): ParticipantAudioLevel[];
  /** Resume playback after the host blocked autoplay. */
  startAudio(): Promise<void>;
  disconnect(): Promise<void>;
  /** Returns an unsubscribe function. */
  subscribe(listener: TransportEventListener): () => void;
}

export interface RealtimeTransport {
  createSession(): RealtimeSession;
}

/** Requests (and immediately releases) microphone access. */
export interface MicrophoneProbe {
  probe(): Promise<void>;
}

/** Destination for downloaded reports. Returns where the report landed. */
export interface ReportSink {
  save(sessionId: string, report: Uint8Array): Promise<string>;
}
