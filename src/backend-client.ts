// Interview Session Client - Backend REST client
// Thin axios wrapper over the interview backend. Every response body is
// narrowed before use and every failure becomes a BackendRequestError.

import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import { BackendRequestError } from "./errors.js";
import type { AttachedFile } from "./types.js";

// ─── Contract ───────────────────────────────────────────────────────────────────

export interface RequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HealthReport {
  healthy: boolean;
  transportConnected: boolean;
}

export interface UploadResult {
  jdText: string;
  resumeText: string;
}

export interface CreateSessionRequest {
  candidateName: string;
  position: string;
  email: string;
  questions: readonly string[];
  analysis: unknown;
  jdText: string;
  resumeText: string;
}

export interface CreatedSession {
  sessionId: string;
  roomName: string | null;
  token: string;
  transportUrl: string;
}

export interface ReportDispatchResult {
  sent: boolean;
  /** Backend-provided detail, on success or failure. */
  message: string | null;
}

export interface BackendClient {
  checkHealth(options?: RequestOptions): Promise<HealthReport>;
  upload(jobDescription: AttachedFile, resume: AttachedFile, options?: RequestOptions): Promise<UploadResult>;
  analyze(jdText: string, resumeText: string, options?: RequestOptions): Promise<unknown>;
  generateQuestions(jdText: string, resumeText: string, count: number, options?: RequestOptions): Promise<string[]>;
  createSession(request: CreateSessionRequest, options?: RequestOptions): Promise<CreatedSession>;
  updateSessionStatus(sessionId: string, status: string, options?: RequestOptions): Promise<void>;
  getSessionStatus(sessionId: string, options?: RequestOptions): Promise<string>;
  /** Resolves with sent=false when the backend answered with an explicit failure. */
  sendReport(sessionId: string, options?: RequestOptions): Promise<ReportDispatchResult>;
  fetchReport(sessionId: string, options?: RequestOptions): Promise<Uint8Array>;
}

// ─── Body narrowing ─────────────────────────────────────────────────────────────

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(body: JsonObject, key: string): string | null {
  const value = body[key];
  return typeof value === "string" ? value : null;
}

function serverError(body: unknown): string | null {
  if (!isRecord(body)) return null;
  return readString(body, "error") ?? readString(body, "message");
}

/**
 * Requires `{ success: true }`; otherwise throws with the body's error text.
 */
function requireSuccess(endpoint: string, body: unknown): JsonObject {
  if (!isRecord(body)) {
    throw new BackendRequestError(endpoint, `${endpoint}: response was not a JSON object`);
  }
  if (body.success !== true) {
    const error = serverError(body);
    throw new BackendRequestError(endpoint, error ?? `${endpoint}: request was not successful`, { serverMessage: error });
  }
  return body;
}

function requireString(endpoint: string, body: JsonObject, key: string): string {
  const value = readString(body, key);
  if (value === null) {
    throw new BackendRequestError(endpoint, `${endpoint}: response is missing "${key}"`);
  }
  return value;
}

function encodeSegment(value: string): string {
  return encodeURIComponent(value);
}

// ─── HTTP implementation ────────────────────────────────────────────────────────

export interface HttpBackendClientOptions {
  baseUrl: string;
  /** Pre-built axios instance (tests pass one with an in-process adapter). */
  http?: AxiosInstance;
}

export class HttpBackendClient implements BackendClient {
  private readonly http: AxiosInstance;

  constructor(options: HttpBackendClientOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        headers: { "Content-Type": "application/json" },
      });
  }

  async checkHealth(options: RequestOptions = {}): Promise<HealthReport> {
    const body = await this.request<unknown>("health", { method: "GET", url: "/health" }, options);
    if (!isRecord(body)) {
      return { healthy: false, transportConnected: false };
    }
    return {
      healthy: body.status === "healthy",
      transportConnected: body.livekit_connected === true,
    };
  }

  async upload(jobDescription: AttachedFile, resume: AttachedFile, options: RequestOptions = {}): Promise<UploadResult> {
    const form = new FormData();
    form.append("jd_file", jobDescription.content, jobDescription.name);
    form.append("resume_file", resume.content, resume.name);

    const body = requireSuccess(
      "upload",
      await this.request<unknown>(
        "upload",
        { method: "POST", url: "/upload", data: form, headers: { "Content-Type": "multipart/form-data" } },
        options,
      ),
    );
    return {
      jdText: requireString("upload", body, "jd_full"),
      resumeText: requireString("upload", body, "resume_full"),
    };
  }

  async analyze(jdText: string, resumeText: string, options: RequestOptions = {}): Promise<unknown> {
    const body = requireSuccess(
      "analyze",
      await this.request<unknown>(
        "analyze",
        { method: "POST", url: "/analyze", data: { jd_text: jdText, resume_text: resumeText } },
        options,
      ),
    );
    return body.analysis ?? null;
  }

  async generateQuestions(jdText: string, resumeText: string, count: number, options: RequestOptions = {}): Promise<string[]> {
    const body = requireSuccess(
      "generate-questions",
      await this.request<unknown>(
        "generate-questions",
        {
          method: "POST",
          url: "/generate-questions",
          data: { jd_text: jdText, resume_text: resumeText, num_questions: count },
        },
        options,
      ),
    );
    const questions = body.questions;
    if (!Array.isArray(questions) || !questions.every((q): q is string => typeof q === "string")) {
      throw new BackendRequestError("generate-questions", "generate-questions: response is missing a question list");
    }
    return questions;
  }

  async createSession(request: CreateSessionRequest, options: RequestOptions = {}): Promise<CreatedSession> {
    const body = requireSuccess(
      "create-session",
      await this.request<unknown>(
        "create-session",
        {
          method: "POST",
          url: "/create-session",
          data: {
            candidate_name: request.candidateName,
            position: request.position,
            email: request.email,
            questions: request.questions,
            analysis: request.analysis,
            jd_full: request.jdText,
            resume_full: request.resumeText,
          },
        },
        options,
      ),
    );
    const data = body.data;
    if (!isRecord(data)) {
      throw new BackendRequestError("create-session", "create-session: response is missing session data");
    }
    return {
      sessionId: requireString("create-session", data, "session_id"),
      roomName: readString(data, "room_name"),
      token: readString(data, "candidate_token") ?? "",
      transportUrl: readString(data, "livekit_url") ?? "",
    };
  }

  async updateSessionStatus(sessionId: string, status: string, options: RequestOptions = {}): Promise<void> {
    requireSuccess(
      "update-session",
      await this.request<unknown>(
        "update-session",
        {
          method: "PUT",
          url: `/session/${encodeSegment(sessionId)}`,
          data: { status, connected_at: new Date().toISOString() },
        },
        options,
      ),
    );
  }

  async getSessionStatus(sessionId: string, options: RequestOptions = {}): Promise<string> {
    const body = requireSuccess(
      "get-session",
      await this.request<unknown>("get-session", { method: "GET", url: `/session/${encodeSegment(sessionId)}` }, options),
    );
    // Older backends nest the session under `data`.
    const direct = body.session;
    const nested = body.data;
    const session = isRecord(direct) ? direct : isRecord(nested) ? nested.session : undefined;
    if (!isRecord(session)) {
      throw new BackendRequestError("get-session", "get-session: response is missing the session");
    }
    return requireString("get-session", session, "status");
  }

  async sendReport(sessionId: string, options: RequestOptions = {}): Promise<ReportDispatchResult> {
    const endpoint = "send-report";
    let body: unknown;
    try {
      body = await this.request<unknown>(endpoint, { method: "POST", url: `/reports/${encodeSegment(sessionId)}/send` }, options);
    } catch (err) {
      // An error status with a `{ success: false }` body is a backend-reported failure, not a transport error.
      if (err instanceof BackendRequestError && err.serverMessage !== null) {
        return { sent: false, message: err.serverMessage };
      }
      throw err;
    }
    if (!isRecord(body)) {
      throw new BackendRequestError(endpoint, `${endpoint}: response was not a JSON object`);
    }
    return { sent: body.success === true, message: serverError(body) };
  }

  async fetchReport(sessionId: string, options: RequestOptions = {}): Promise<Uint8Array> {
    const data = await this.request<ArrayBuffer>(
      "fetch-report",
      { method: "GET", url: `/reports/${encodeSegment(sessionId)}`, responseType: "arraybuffer" },
      options,
    );
    return new Uint8Array(data);
  }

  private async request<T>(endpoint: string, config: AxiosRequestConfig, options: RequestOptions): Promise<T> {
    try {
      const response = await this.http.request<T>({
        ...config,
        timeout: options.timeoutMs ?? 0,
        signal: options.signal,
      });
      return response.data;
    } catch (err) {
      throw toBackendError(endpoint, err);
    }
  }
}

/**
 * Maps an axios (or any) failure onto BackendRequestError. Timeouts and
 * aborts are flagged so callers can tell them apart from server errors.
 */
export function toBackendError(endpoint: string, err: unknown): BackendRequestError {
  if (err instanceof BackendRequestError) {
    return err;
  }
  if (axios.isAxiosError(err)) {
    const timedOut = err.code === "ECONNABORTED" || err.code === "ETIMEDOUT" || err.code === "ERR_CANCELED";
    if (err.response) {
      const status = err.response.status;
      const detail = serverError(err.response.data);
      return new BackendRequestError(endpoint, detail ?? `HTTP ${status}`, {
        status,
        timedOut,
        serverMessage: detail,
        cause: err,
      });
    }
    return new BackendRequestError(endpoint, timedOut ? `${endpoint} timed out` : err.message, { timedOut, cause: err });
  }
  if (err instanceof Error) {
    return new BackendRequestError(endpoint, err.message, { cause: err });
  }
  return new BackendRequestError(endpoint, String(err), { cause: err });
}
