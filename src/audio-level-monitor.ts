// Interview Session Client - Audio level sampler
// Samples microphone and interviewer levels from a live session on a fixed
// interval for the level meters.

import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { describeError } from "./errors.js";
import type { TaskScheduler, ScheduledTask } from "./scheduler.js";
import type { AudioLevels, MicLevelBand, RealtimeSession } from "./types.js";

export const SILENT_LEVELS: Readonly<AudioLevels> = Object.freeze({
  microphone: 0,
  interviewer: 0,
  microphoneBand: "low",
});

export function micLevelBand(level: number): MicLevelBand {
  if (level > 70) return "high";
  if (level > 30) return "medium";
  return "low";
}

/** Converts a 0..1 transport level to a clamped 0..100 meter value. */
function toPercent(level: number): number {
  if (!Number.isFinite(level) || level <= 0) return 0;
  return Math.min(level * 100, 100);
}

/**
 * Reads one sample. Remote participants that are the candidate (or report
 * the placeholder identity "unknown") do not count as the interviewer.
 */
export function sampleLevels(session: RealtimeSession, candidateIdentity: string): AudioLevels {
  const microphone = session.localAudioTrackCount() > 0 ? toPercent(session.localAudioLevel()) : 0;
  let interviewer = 0;
  for (const participant of session.remoteAudioLevels()) {
    if (participant.identity === candidateIdentity || participant.identity === "unknown") continue;
    interviewer = Math.max(interviewer, toPercent(participant.level));
  }
  return { microphone, interviewer, microphoneBand: micLevelBand(microphone) };
}

export interface AudioLevelMonitorDeps {
  scheduler: TaskScheduler;
  intervalMs: number;
  onLevels: (levels: AudioLevels) => void;
  logger?: Logger;
}

export class AudioLevelMonitor {
  private readonly deps: AudioLevelMonitorDeps;
  private readonly logger: Logger;
  private task: ScheduledTask | null = null;

  constructor(deps: AudioLevelMonitorDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("AudioLevelMonitor");
  }

  get running(): boolean {
    return this.task?.active ?? false;
  }

  start(session: RealtimeSession, candidateIdentity: string): void {
    this.stop();
    this.task = this.deps.scheduler.every("audio-levels", this.deps.intervalMs, () => {
      try {
        this.deps.onLevels(sampleLevels(session, candidateIdentity));
      } catch (err) {
        this.logger.warn(`Audio level sampling error: ${describeError(err)}`);
      }
    });
    this.logger.debug("Audio level monitoring started");
  }

  stop(): void {
    if (!this.task) return;
    this.task.cancel();
    this.task = null;
    this.deps.onLevels(SILENT_LEVELS);
  }
}
