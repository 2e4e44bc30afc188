// Unit tests for the Status Reconciler

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  DEFAULT_STATUS_REQUEST_TIMEOUT_MS,
  IN_PROGRESS_MESSAGE,
  STATUS_TIMEOUT_MESSAGE,
  StatusReconciler,
  normalizeSessionStatus,
  outcomeForStatus,
} from "./status-reconciler.js";
import { DEFAULT_CONFIG } from "./config.js";
import { silentLogger } from "./logger.js";
import { fakeBackend } from "./test-helpers.js";
import type { BackendClient } from "./backend-client.js";
import type { SessionStatus } from "./types.js";

function statusSequence(...statuses: string[]) {
  let index = 0;
  return vi.fn(async () => {
    const status = statuses[Math.min(index, statuses.length - 1)];
    index++;
    return status;
  });
}

function setup(getSessionStatus: BackendClient["getSessionStatus"]) {
  const backend = fakeBackend({ getSessionStatus });
  const onOutcome = vi.fn();
  const onStillLive = vi.fn();
  const onMessage = vi.fn();
  const reconciler = new StatusReconciler({
    backend,
    poll: DEFAULT_CONFIG.poll,
    onOutcome,
    onStillLive,
    onMessage,
    logger: silentLogger,
  });
  return { backend, reconciler, onOutcome, onStillLive, onMessage };
}

describe("normalizeSessionStatus", () => {
  it("trims and lowercases known statuses", () => {
    expect(normalizeSessionStatus(" Completed ")).toBe("completed");
    expect(normalizeSessionStatus("IN-PROGRESS")).toBe("in-progress");
  });

  it("returns a value usable as a session status", () => {
    const status: SessionStatus | null = normalizeSessionStatus("ERROR");
    expect(outcomeForStatus(status)).toBe("failed");
  });

  it("returns null for anything else", () => {
    expect(normalizeSessionStatus("archived")).toBeNull();
    expect(normalizeSessionStatus("")).toBeNull();
  });
});

describe("outcomeForStatus", () => {
  it("maps terminal statuses", () => {
    expect(outcomeForStatus("completed")).toBe("completed");
    expect(outcomeForStatus("disconnected")).toBe("ended");
    expect(outcomeForStatus("failed")).toBe("failed");
    expect(outcomeForStatus("error")).toBe("failed");
  });

  it("leaves live and unknown statuses unresolved", () => {
    expect(outcomeForStatus("interviewing")).toBeNull();
    expect(outcomeForStatus("created")).toBeNull();
    expect(outcomeForStatus(null)).toBeNull();
  });
});

describe("StatusReconciler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("polls once per interval and stops at the terminal status", async () => {
    const { backend, reconciler, onOutcome, onStillLive, onMessage } = setup(
      statusSequence("in-progress", "in-progress", "completed"),
    );

    reconciler.start("session-1");
    await vi.advanceTimersByTimeAsync(999);
    expect(backend.getSessionStatus).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(2_000);
    expect(backend.getSessionStatus).toHaveBeenCalledTimes(2);
    expect(onOutcome).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(backend.getSessionStatus).toHaveBeenCalledTimes(3);
    expect(onOutcome).toHaveBeenCalledWith({ sessionId: "session-1", outcome: "completed", attempts: 3 });
    expect(onStillLive).toHaveBeenCalledTimes(2);
    expect(onMessage).toHaveBeenCalledWith("voice", { level: "info", text: IN_PROGRESS_MESSAGE });
    expect(reconciler.running).toBe(false);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(backend.getSessionStatus).toHaveBeenCalledTimes(3);
  });

  it("gives up after the poll ceiling with a warning", async () => {
    const { backend, reconciler, onOutcome, onMessage } = setup(vi.fn(async () => "in-progress"));

    reconciler.start("session-1");
    await vi.advanceTimersByTimeAsync(30_000);

    expect(backend.getSessionStatus).toHaveBeenCalledTimes(30);
    expect(onOutcome).toHaveBeenCalledTimes(1);
    expect(onOutcome).toHaveBeenCalledWith({ sessionId: "session-1", outcome: "unresolved", attempts: 30 });
    expect(onMessage).toHaveBeenLastCalledWith("voice", { level: "warning", text: STATUS_TIMEOUT_MESSAGE });

    await vi.advanceTimersByTimeAsync(5_000);
    expect(backend.getSessionStatus).toHaveBeenCalledTimes(30);
  });

  it("counts failed polls toward the ceiling", async () => {
    const { reconciler, onOutcome, onStillLive } = setup(
      vi.fn(async (): Promise<string> => {
        throw new Error("HTTP 503");
      }),
    );

    reconciler.start("session-1");
    await vi.advanceTimersByTimeAsync(30_000);

    expect(onOutcome).toHaveBeenCalledWith({ sessionId: "session-1", outcome: "unresolved", attempts: 30 });
    expect(onStillLive).not.toHaveBeenCalled();
  });

  it("resolves a disconnected session as ended", async () => {
    const { reconciler, onOutcome } = setup(statusSequence("Disconnected"));

    reconciler.start("session-1");
    await vi.advanceTimersByTimeAsync(1_000);

    expect(onOutcome).toHaveBeenCalledWith({ sessionId: "session-1", outcome: "ended", attempts: 1 });
  });

  it("gives a slow answer the request timeout, not the poll interval", async () => {
    const getSessionStatus = vi.fn(
      () => new Promise<string>((resolve) => setTimeout(() => resolve("completed"), 3_000)),
    );
    const { backend, reconciler, onOutcome } = setup(getSessionStatus);

    reconciler.start("session-1");
    await vi.advanceTimersByTimeAsync(1_000);
    expect(backend.getSessionStatus).toHaveBeenCalledWith("session-1", {
      timeoutMs: DEFAULT_STATUS_REQUEST_TIMEOUT_MS,
    });

    await vi.advanceTimersByTimeAsync(3_000);
    expect(onOutcome).toHaveBeenCalledWith({ sessionId: "session-1", outcome: "completed", attempts: 1 });
    expect(backend.getSessionStatus).toHaveBeenCalledTimes(1);
  });

  it("keeps one cycle per session", async () => {
    const { backend, reconciler } = setup(statusSequence("in-progress", "in-progress", "completed"));

    reconciler.start("session-1");
    await vi.advanceTimersByTimeAsync(500);
    reconciler.start("session-1");
    await vi.advanceTimersByTimeAsync(500);

    expect(backend.getSessionStatus).toHaveBeenCalledTimes(1);
    expect(reconciler.currentCycle).toEqual({ sessionId: "session-1", attempts: 1, maxAttempts: 30, intervalMs: 1_000 });
  });

  it("drops a poll that settles after stop", async () => {
    let release: (status: string) => void = () => {};
    const { reconciler, onOutcome, onMessage } = setup(
      vi.fn(
        () =>
          new Promise<string>((resolve) => {
            release = resolve;
          }),
      ),
    );

    reconciler.start("session-1");
    await vi.advanceTimersByTimeAsync(1_000);
    reconciler.stop();
    release("completed");
    await vi.advanceTimersByTimeAsync(5_000);

    expect(onOutcome).not.toHaveBeenCalled();
    expect(onMessage).not.toHaveBeenCalled();
    expect(reconciler.running).toBe(false);
  });
});
