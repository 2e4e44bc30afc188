// Unit tests for the Audio Level Monitor

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AudioLevelMonitor, SILENT_LEVELS, micLevelBand, sampleLevels } from "./audio-level-monitor.js";
import { TaskScheduler } from "./scheduler.js";
import { FakeSession, mockLogger } from "./test-helpers.js";

describe("micLevelBand", () => {
  it("splits at 30 and 70", () => {
    expect(micLevelBand(0)).toBe("low");
    expect(micLevelBand(30)).toBe("low");
    expect(micLevelBand(31)).toBe("medium");
    expect(micLevelBand(70)).toBe("medium");
    expect(micLevelBand(71)).toBe("high");
  });
});

describe("sampleLevels", () => {
  it("scales the local level and takes the loudest interviewer", () => {
    const session = new FakeSession();
    session.localLevel = 0.5;
    session.remoteLevels = [
      { identity: "interviewer-agent", level: 0.25 },
      { identity: "second-agent", level: 0.75 },
    ];

    expect(sampleLevels(session, "Ada Candidate")).toEqual({
      microphone: 50,
      interviewer: 75,
      microphoneBand: "medium",
    });
  });

  it("ignores the candidate and the unknown placeholder among remotes", () => {
    const session = new FakeSession();
    session.remoteLevels = [
      { identity: "Ada Candidate", level: 1 },
      { identity: "unknown", level: 0.9 },
      { identity: "interviewer-agent", level: 0.1 },
    ];

    expect(sampleLevels(session, "Ada Candidate").interviewer).toBe(10);
  });

  it("reads zero without a local track and clamps loud input", () => {
    const session = new FakeSession();
    session.localLevel = 0.9;
    session.trackCount = 0;
    expect(sampleLevels(session, "Ada Candidate").microphone).toBe(0);

    session.trackCount = 1;
    session.localLevel = 1.4;
    expect(sampleLevels(session, "Ada Candidate")).toEqual({ microphone: 100, interviewer: 0, microphoneBand: "high" });
  });
});

describe("AudioLevelMonitor", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("samples on every interval and emits silence when stopped", () => {
    const scheduler = new TaskScheduler();
    const onLevels = vi.fn();
    const monitor = new AudioLevelMonitor({ scheduler, intervalMs: 100, onLevels, logger: mockLogger() });
    const session = new FakeSession();
    session.localLevel = 0.8;

    monitor.start(session, "Ada Candidate");
    vi.advanceTimersByTime(300);

    expect(monitor.running).toBe(true);
    expect(onLevels).toHaveBeenCalledTimes(3);
    expect(onLevels).toHaveBeenLastCalledWith({ microphone: 80, interviewer: 0, microphoneBand: "high" });

    monitor.stop();
    expect(monitor.running).toBe(false);
    expect(onLevels).toHaveBeenLastCalledWith(SILENT_LEVELS);
    expect(scheduler.activeCount).toBe(0);

    vi.advanceTimersByTime(500);
    expect(onLevels).toHaveBeenCalledTimes(4);
  });

  it("logs a failed sample and keeps sampling", () => {
    const logger = mockLogger();
    const onLevels = vi.fn();
    const monitor = new AudioLevelMonitor({ scheduler: new TaskScheduler(), intervalMs: 100, onLevels, logger });
    const session = new FakeSession();
    let calls = 0;
    session.remoteAudioLevels = () => {
      calls++;
      if (calls === 1) throw new Error("participant gone");
      return [];
    };

    monitor.start(session, "Ada Candidate");
    vi.advanceTimersByTime(200);

    expect(logger.warn).toHaveBeenCalledWith("Audio level sampling error: participant gone");
    expect(onLevels).toHaveBeenCalledTimes(1);
    monitor.stop();
  });

  it("does nothing when stopped before it started", () => {
    const onLevels = vi.fn();
    const monitor = new AudioLevelMonitor({ scheduler: new TaskScheduler(), intervalMs: 100, onLevels, logger: mockLogger() });
    monitor.stop();
    expect(onLevels).not.toHaveBeenCalled();
  });
});
