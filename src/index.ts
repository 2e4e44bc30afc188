// Interview Session Client - Public API
// Re-exports the components and wires a ready-to-use InterviewClient.

import { HttpBackendClient } from "./backend-client.js";
import type { BackendClient } from "./backend-client.js";
import { DEFAULT_CONFIG } from "./config.js";
import type { InterviewClientConfig } from "./config.js";
import { InterviewClient } from "./interview-client.js";
import { LiveKitTransport } from "./livekit-transport.js";
import type { Logger } from "./logger.js";
import { BrowserMicrophoneProbe } from "./microphone-probe.js";
import type { MicrophoneProbe, RealtimeTransport, ReportSink } from "./types.js";

export const APP_NAME = "Interview Session Client";
export const APP_VERSION = "0.1.0";

export interface CreateInterviewClientOptions {
  /** Where downloaded reports go: a file store in Node, a download trigger in a browser. */
  reportSink: ReportSink;
  config?: InterviewClientConfig;
  backend?: BackendClient;
  transport?: RealtimeTransport;
  probe?: MicrophoneProbe;
  logger?: Logger;
}

/**
 * Builds an InterviewClient over the HTTP backend, LiveKit and the host's
 * getUserMedia unless other implementations are passed in.
 */
export function createInterviewClient(options: CreateInterviewClientOptions): InterviewClient {
  const config = options.config ?? DEFAULT_CONFIG;
  return new InterviewClient({
    config,
    backend: options.backend ?? new HttpBackendClient({ baseUrl: config.apiBaseUrl }),
    transport: options.transport ?? new LiveKitTransport(),
    probe: options.probe ?? new BrowserMicrophoneProbe(),
    reportSink: options.reportSink,
    logger: options.logger,
  });
}

export * from "./types.js";
export * from "./errors.js";
export { DEFAULT_CONFIG, MAX_FILE_SIZE_BYTES, loadConfig } from "./config.js";
export type { ConnectorConfig, InterviewClientConfig, PollConfig, RetryConfig, StepTimeouts } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { TaskScheduler } from "./scheduler.js";
export type { ScheduledTask } from "./scheduler.js";
export { HttpBackendClient } from "./backend-client.js";
export type {
  BackendClient,
  CreatedSession,
  CreateSessionRequest,
  HealthReport,
  ReportDispatchResult,
  RequestOptions,
  UploadResult,
} from "./backend-client.js";
export { FormGate, validateForm } from "./form-gate.js";
export { SetupPipeline } from "./setup-pipeline.js";
export { SessionConnector } from "./session-connector.js";
export { ConnectionSupervisor, remediationMessage } from "./connection-supervisor.js";
export type { DisconnectCause, SupervisorEvent, SupervisorSnapshot } from "./connection-supervisor.js";
export { StatusReconciler, normalizeSessionStatus } from "./status-reconciler.js";
export type { ReconcilerResult } from "./status-reconciler.js";
export { CompletionDispatcher } from "./completion-dispatcher.js";
export { BrowserMicrophoneProbe } from "./microphone-probe.js";
export { LiveKitTransport, LiveKitSession, INTERVIEW_ROOM_OPTIONS } from "./livekit-transport.js";
export { ReportStore, reportFileName } from "./report-store.js";
export { InterviewClient } from "./interview-client.js";
export type { InterviewClientSnapshot, InterviewProgress } from "./interview-client.js";
