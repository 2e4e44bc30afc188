// Interview Session Client - Completion Dispatcher
// Acts on a reconciled outcome: for a completed interview, asks the backend to
// email the report and, one results-delay later, shows results and downloads
// the report. Each session is dispatched at most once.

import { BackendRequestError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { BackendClient } from "./backend-client.js";
import { TaskScheduler } from "./scheduler.js";
import type { InterviewOutcome, MessageChannel, MessageSink, ReportSink, UserMessage } from "./types.js";

export const REPORT_SENT_MESSAGE = "Interview completed! Report has been sent to HR and your email.";
export const REPORT_UNREACHABLE_MESSAGE =
  "Interview completed, but the report service could not be reached. Please download it manually.";

export function reportNotSentMessage(reason: string): string {
  return `Interview completed, but the report could not be sent (${reason}). Please download it manually.`;
}

export type ReportDispatchOutcome = "sent" | "rejected" | "unreachable";

export interface CompletionDispatcherDeps {
  backend: Pick<BackendClient, "sendReport" | "fetchReport">;
  sink: ReportSink;
  reportTimeoutMs: number;
  resultsDelayMs: number;
  /** Called when the host should switch to the results view. */
  onShowResults: (sessionId: string, outcome: InterviewOutcome) => void;
  onMessage?: MessageSink;
  logger?: Logger;
  scheduler?: TaskScheduler;
}

export class CompletionDispatcher {
  private readonly deps: CompletionDispatcherDeps;
  private readonly logger: Logger;
  private readonly scheduler: TaskScheduler;
  private readonly dispatched = new Set<string>();

  constructor(deps: CompletionDispatcherDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("CompletionDispatcher");
    this.scheduler = deps.scheduler ?? new TaskScheduler();
  }

  hasDispatched(sessionId: string): boolean {
    return this.dispatched.has(sessionId);
  }

  /**
   * Routes a reconciled outcome. Only "completed" sends and downloads the
   * report; "ended" and "failed" go straight to results; "unresolved" leaves
   * the view where it is.
   */
  handleOutcome(sessionId: string, outcome: InterviewOutcome): void {
    switch (outcome) {
      case "completed":
        this.dispatchCompleted(sessionId);
        return;
      case "ended":
        this.post("voice", { level: "info", text: "Interview session has ended." });
        this.showResultsLater(sessionId, outcome, false);
        return;
      case "failed":
        this.post("voice", { level: "warning", text: "The interview session ended with an error." });
        this.showResultsLater(sessionId, outcome, false);
        return;
      case "unresolved":
        this.logger.warn(`Session ${sessionId} status unresolved; waiting for a manual check`);
        return;
    }
  }

  /**
   * Requests the report email. Resolves with how the request went and never
   * rejects; every outcome is posted as a message.
   */
  async sendReport(sessionId: string): Promise<ReportDispatchOutcome> {
    try {
      const result = await this.deps.backend.sendReport(sessionId, { timeoutMs: this.deps.reportTimeoutMs });
      if (result.sent) {
        this.logger.info(`Report for session ${sessionId} sent`);
        this.post("results", { level: "success", text: REPORT_SENT_MESSAGE });
        return "sent";
      }
      const reason = result.message ?? "no reason given";
      this.logger.error(`Backend refused to send report for ${sessionId}: ${reason}`);
      this.post("results", { level: "warning", text: reportNotSentMessage(reason) });
      return "rejected";
    } catch (err) {
      if (err instanceof BackendRequestError && err.status !== null) {
        this.logger.error(`Report sending failed with status ${err.status}`);
        this.post("results", { level: "warning", text: reportNotSentMessage(err.message) });
        return "rejected";
      }
      this.logger.error(`Error sending report: ${describeError(err)}`);
      this.post("results", { level: "warning", text: REPORT_UNREACHABLE_MESSAGE });
      return "unreachable";
    }
  }

  /**
   * Downloads the report and hands it to the sink.
   * @returns Where the report landed, or null when the download failed.
   */
  async downloadReport(sessionId: string): Promise<string | null> {
    try {
      const report = await this.deps.backend.fetchReport(sessionId, { timeoutMs: this.deps.reportTimeoutMs });
      const location = await this.deps.sink.save(sessionId, report);
      this.logger.info(`Report downloaded to ${location}`);
      this.post("results", { level: "success", text: `Report downloaded: ${location}` });
      return location;
    } catch (err) {
      this.logger.error(`Report download failed: ${describeError(err)}`);
      this.post("results", { level: "danger", text: `Report download failed: ${describeError(err)}` });
      return null;
    }
  }

  /** Cancels a pending results transition. Dispatch history is kept. */
  cancel(): void {
    this.scheduler.cancelAll();
  }

  private dispatchCompleted(sessionId: string): void {
    if (this.dispatched.has(sessionId)) {
      this.logger.warn(`Session ${sessionId} already dispatched; ignoring`);
      return;
    }
    this.dispatched.add(sessionId);
    this.post("voice", { level: "success", text: "Interview completed! Generating report..." });

    this.sendReport(sessionId).catch((err: unknown) => {
      this.logger.error(`Report dispatch crashed: ${describeError(err)}`);
    });
    this.showResultsLater(sessionId, "completed", true);
  }

  private showResultsLater(sessionId: string, outcome: InterviewOutcome, download: boolean): void {
    this.scheduler.schedule("show-results", this.deps.resultsDelayMs, () => {
      this.deps.onShowResults(sessionId, outcome);
      if (!download) return;
      this.downloadReport(sessionId).catch((err: unknown) => {
        this.logger.error(`Report download crashed: ${describeError(err)}`);
      });
    });
  }

  private post(channel: MessageChannel, message: UserMessage): void {
    this.deps.onMessage?.(channel, message);
  }
}
