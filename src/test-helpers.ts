// Interview Session Client - In-process fakes shared by the test suites

import { vi } from "vitest";
import type { Mock } from "vitest";
import type { BackendClient } from "./backend-client.js";
import type { Logger } from "./logger.js";
import type {
  AttachedFile,
  ParticipantAudioLevel,
  RealtimeSession,
  RealtimeTransport,
  SessionDescriptor,
  TransportEvent,
  TransportEventListener,
  ValidatedCandidateForm,
} from "./types.js";

// ─── Real-time transport ────────────────────────────────────────────────────────

export class FakeSession implements RealtimeSession {
  connectImpl: (url: string, token: string) => Promise<void> = async () => {};
  enableMicrophoneImpl: () => Promise<void> = async () => {};
  startAudioImpl: () => Promise<void> = async () => {};
  trackCount = 1;
  localLevel = 0;
  remoteLevels: ParticipantAudioLevel[] = [];

  readonly connectCalls: Array<{ url: string; token: string }> = [];
  enableMicrophoneCalls = 0;
  startAudioCalls = 0;
  disconnectCalls = 0;
  private readonly listeners = new Set<TransportEventListener>();

  connect(url: string, token: string): Promise<void> {
    this.connectCalls.push({ url, token });
    return this.connectImpl(url, token);
  }

  enableMicrophone(): Promise<void> {
    this.enableMicrophoneCalls++;
    return this.enableMicrophoneImpl();
  }

  localAudioTrackCount(): number {
    return this.trackCount;
  }

  localAudioLevel(): number {
    return this.localLevel;
  }

  remoteAudioLevels(): ParticipantAudioLevel[] {
    return this.remoteLevels;
  }

  startAudio(): Promise<void> {
    this.startAudioCalls++;
    return this.startAudioImpl();
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
  }

  subscribe(listener: TransportEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  emit(event: TransportEvent): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}

export class FakeTransport implements RealtimeTransport {
  readonly sessions: FakeSession[] = [];
  /** Runs on every new session before it is handed out. */
  configure: (session: FakeSession, index: number) => void = () => {};

  createSession(): FakeSession {
    const session = new FakeSession();
    this.configure(session, this.sessions.length);
    this.sessions.push(session);
    return session;
  }

  get last(): FakeSession {
    const session = this.sessions.at(-1);
    if (!session) {
      throw new Error("No session has been created");
    }
    return session;
  }
}

export function grantingProbe(): { probe: Mock<() => Promise<void>> } {
  return { probe: vi.fn(async () => {}) };
}

// ─── Backend ────────────────────────────────────────────────────────────────────

export function fakeBackend(overrides: Partial<BackendClient> = {}): BackendClient {
  return {
    checkHealth: vi.fn(async () => ({ healthy: true, transportConnected: true })),
    upload: vi.fn(async () => ({ jdText: "jd text", resumeText: "resume text" })),
    analyze: vi.fn(async () => ({ fit: "strong" })),
    generateQuestions: vi.fn(async (_jd: string, _resume: string, count: number) =>
      Array.from({ length: count }, (_, i) => `Question ${i + 1}?`),
    ),
    createSession: vi.fn(async () => ({
      sessionId: "session-0123456789",
      roomName: "interview-room",
      token: "test-token",
      transportUrl: "wss://rtc.example.test",
    })),
    updateSessionStatus: vi.fn(async () => {}),
    getSessionStatus: vi.fn(async () => "in-progress"),
    sendReport: vi.fn(async () => ({ sent: true, message: null })),
    fetchReport: vi.fn(async () => new Uint8Array([37, 80, 68, 70])),
    ...overrides,
  };
}

// ─── Values ─────────────────────────────────────────────────────────────────────

export function makeDescriptor(overrides: Partial<SessionDescriptor> = {}): SessionDescriptor {
  return Object.freeze({
    sessionId: "session-0123456789",
    candidateName: "Ada Candidate",
    questions: Object.freeze(["Tell me about yourself?", "Why this role?"]),
    transportUrl: "wss://rtc.example.test",
    token: "test-token",
    roomName: "interview-room",
    createdAt: new Date("2025-01-15T14:30:00.000Z"),
    ...overrides,
  });
}

export function makeFile(name: string, size = 1024): AttachedFile {
  return { name, size, content: new Blob(["file body"]) };
}

export function makeValidatedForm(): ValidatedCandidateForm {
  return {
    name: "Ada Candidate",
    position: "Backend Engineer",
    email: "ada@example.test",
    jobDescription: makeFile("jd.pdf"),
    resume: makeFile("resume.pdf"),
  };
}

type LogMethod = (message: string, ...args: unknown[]) => void;

export function mockLogger(): Record<keyof Logger, Mock<LogMethod>> {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
