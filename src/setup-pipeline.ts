// Interview Session Client - Setup Pipeline
// upload → analyze → generate-questions → create-session, strictly in order.
// Each step has its own timeout and gates the next; the first failure aborts
// the run and nothing is retried within a step.

import { BackendRequestError, SetupCancelledError, SetupStepError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { BackendClient, RequestOptions } from "./backend-client.js";
import type { StepTimeouts } from "./config.js";
import { TaskScheduler } from "./scheduler.js";
import { withTimeout } from "./timeout.js";
import type { SessionDescriptor, SetupProgress, SetupStep, ValidatedCandidateForm } from "./types.js";

// ─── Step metadata ──────────────────────────────────────────────────────────────

interface StepText {
  failed: string;
  timedOut: string;
}

const STEP_TEXT: Record<SetupStep, StepText> = {
  upload: {
    failed: "File upload failed",
    timedOut: "File upload timed out. Please try again with smaller files.",
  },
  analyze: {
    failed: "Document analysis failed",
    timedOut: "Document analysis timed out. Please try again.",
  },
  "generate-questions": {
    failed: "Question generation failed",
    timedOut: "Question generation timed out. Please try again.",
  },
  "create-session": {
    failed: "Session creation failed",
    timedOut: "Session creation timed out. Please try again.",
  },
};

export const SETUP_PROGRESS = {
  start: { percent: 10, label: "Uploading files...", detail: "Preparing documents for analysis" },
  uploaded: { percent: 30, label: "Analyzing documents...", detail: "AI is analyzing job requirements and candidate profile" },
  analyzed: { percent: 60, label: "Generating questions...", detail: "Creating personalized interview questions" },
  questions: { percent: 80, label: "Creating interview session...", detail: "Setting up voice interview room" },
  done: { percent: 100, label: "Setup complete!", detail: "Ready to start voice interview" },
} as const satisfies Record<string, SetupProgress>;

/**
 * User-facing text for a failed step. Timeouts get step-specific guidance;
 * request failures carry the server's own error when it sent one.
 */
export function describeStepFailure(step: SetupStep, error: unknown, timedOut: boolean): string {
  const text = STEP_TEXT[step];
  if (timedOut) {
    return text.timedOut;
  }
  if (error instanceof BackendRequestError) {
    if (error.serverMessage !== null) return error.serverMessage;
    if (error.status !== null) return `${text.failed} with status ${error.status}`;
  }
  return `${text.failed}: ${describeError(error)}`;
}

// ─── Pipeline ───────────────────────────────────────────────────────────────────

export interface SetupPipelineDeps {
  backend: BackendClient;
  timeouts: StepTimeouts;
  questionCount: number;
  logger?: Logger;
  scheduler?: TaskScheduler;
  now?: () => Date;
}

export class SetupPipeline {
  private readonly deps: SetupPipelineDeps;
  private readonly logger: Logger;
  private readonly scheduler: TaskScheduler;
  /** Bumped on every run and cancel; a step that settles under an older run stops it. */
  private runId = 0;
  private activeRequest: AbortController | null = null;

  constructor(deps: SetupPipelineDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("SetupPipeline");
    this.scheduler = deps.scheduler ?? new TaskScheduler();
  }

  /**
   * Runs all four steps and returns a frozen SessionDescriptor.
   * @throws SetupStepError naming the failed step, or SetupCancelledError
   * once cancel() has superseded the run.
   */
  async run(form: ValidatedCandidateForm, onProgress: (progress: SetupProgress) => void): Promise<SessionDescriptor> {
    const { backend, timeouts, questionCount } = this.deps;
    const runId = ++this.runId;
    let lastPercent = 0;
    const report = (progress: SetupProgress) => {
      if (progress.percent < lastPercent) return;
      lastPercent = progress.percent;
      onProgress(progress);
    };

    report(SETUP_PROGRESS.start);

    const uploaded = await this.step(runId, "upload", timeouts.uploadMs, (options) =>
      backend.upload(form.jobDescription, form.resume, options),
    );
    report(SETUP_PROGRESS.uploaded);

    const analysis = await this.step(runId, "analyze", timeouts.analyzeMs, (options) =>
      backend.analyze(uploaded.jdText, uploaded.resumeText, options),
    );
    report(SETUP_PROGRESS.analyzed);

    const questions = await this.step(runId, "generate-questions", timeouts.generateQuestionsMs, async (options) => {
      const generated = await backend.generateQuestions(uploaded.jdText, uploaded.resumeText, questionCount, options);
      if (generated.length === 0) {
        throw new BackendRequestError("generate-questions", "No interview questions were generated", {
          serverMessage: "No interview questions were generated",
        });
      }
      return generated;
    });
    report(SETUP_PROGRESS.questions);

    const created = await this.step(runId, "create-session", timeouts.createSessionMs, (options) =>
      backend.createSession(
        {
          candidateName: form.name,
          position: form.position,
          email: form.email,
          questions,
          analysis,
          jdText: uploaded.jdText,
          resumeText: uploaded.resumeText,
        },
        options,
      ),
    );
    report(SETUP_PROGRESS.done);

    const descriptor: SessionDescriptor = Object.freeze({
      sessionId: created.sessionId,
      candidateName: form.name,
      questions: Object.freeze([...questions]),
      transportUrl: created.transportUrl,
      token: created.token,
      roomName: created.roomName,
      createdAt: (this.deps.now ?? (() => new Date()))(),
    });
    this.logger.info(`Session ${descriptor.sessionId} ready with ${descriptor.questions.length} questions`);
    return descriptor;
  }

  /** Aborts the in-flight request and stops the run before its next step. */
  cancel(): void {
    this.runId++;
    this.scheduler.cancelAll();
    const controller = this.activeRequest;
    this.activeRequest = null;
    controller?.abort();
  }

  private async step<T>(
    runId: number,
    step: SetupStep,
    timeoutMs: number,
    call: (options: RequestOptions) => Promise<T>,
  ): Promise<T> {
    this.ensureCurrent(runId, step);
    const controller = new AbortController();
    this.activeRequest = controller;
    let timedOut = false;
    this.logger.info(`Step ${step} started (timeout ${timeoutMs}ms)`);
    try {
      const result = await withTimeout(call({ signal: controller.signal, timeoutMs }), {
        timeoutMs,
        name: `setup-${step}`,
        scheduler: this.scheduler,
        onTimeout: () => {
          timedOut = true;
          controller.abort();
          return new Error(`${step} timed out after ${timeoutMs}ms`);
        },
      });
      this.ensureCurrent(runId, step);
      return result;
    } catch (err) {
      if (err instanceof SetupCancelledError) throw err;
      this.ensureCurrent(runId, step, err);
      const isTimeout = timedOut || (err instanceof BackendRequestError && err.timedOut);
      const message = describeStepFailure(step, err, isTimeout);
      this.logger.error(`Step ${step} failed: ${message}`);
      throw new SetupStepError(step, message, isTimeout, err);
    } finally {
      if (this.activeRequest === controller) {
        this.activeRequest = null;
      }
    }
  }

  private ensureCurrent(runId: number, step: SetupStep, cause?: unknown): void {
    if (runId !== this.runId) {
      this.logger.info(`Setup run cancelled at step ${step}`);
      throw new SetupCancelledError(step, cause);
    }
  }
}
