// Interview Session Client - Microphone permission probe
// A throwaway getUserMedia call, kept apart from the real publish so that
// permission and hardware problems are told apart from negotiation problems.

import { ConnectionFailure, describeError } from "./errors.js";
import type { MicrophoneProbe } from "./types.js";

interface ProbeStream {
  getTracks(): Array<{ stop(): void }>;
}

/** The slice of MediaDevices the probe touches. */
export interface MediaDevicesLike {
  getUserMedia(constraints: MediaStreamConstraints): Promise<ProbeStream>;
}

function errorName(error: unknown): string {
  if (typeof error === "object" && error !== null && "name" in error && typeof error.name === "string") {
    return error.name;
  }
  return "";
}

/**
 * Maps a getUserMedia rejection to a typed, non-retryable connection failure.
 */
export function classifyMicrophoneError(error: unknown): ConnectionFailure {
  const name = errorName(error);
  if (name === "NotAllowedError" || name === "PermissionDeniedError") {
    return new ConnectionFailure(
      "permission-denied",
      "Microphone access denied. Please enable microphone permissions and refresh the page.",
      error,
    );
  }
  if (name === "NotFoundError") {
    return new ConnectionFailure("device-not-found", "No microphone found. Please connect a microphone and try again.", error);
  }
  return new ConnectionFailure("microphone", `Microphone error: ${describeError(error)}`, error);
}

export class BrowserMicrophoneProbe implements MicrophoneProbe {
  private readonly mediaDevices: MediaDevicesLike | undefined;

  constructor(mediaDevices: MediaDevicesLike | undefined = globalThis.navigator?.mediaDevices) {
    this.mediaDevices = mediaDevices;
  }

  async probe(): Promise<void> {
    if (!this.mediaDevices) {
      throw new ConnectionFailure("device-not-found", "No microphone API is available in this environment.");
    }
    let stream: ProbeStream;
    try {
      stream = await this.mediaDevices.getUserMedia({ audio: true, video: false });
    } catch (err) {
      throw classifyMicrophoneError(err);
    }
    for (const track of stream.getTracks()) {
      track.stop();
    }
  }
}
