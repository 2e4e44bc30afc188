// Interview Session Client - LiveKit transport adapter
// Production RealtimeSession over a livekit-client Room. Room events are
// translated into TransportEvents; nothing above this file imports LiveKit.

import {
  ConnectionQuality as LiveKitQuality,
  Room,
  RoomEvent,
  Track,
  type Participant,
  type RemoteParticipant,
  type RemoteTrack,
  type RoomOptions,
} from "livekit-client";
import type {
  ConnectionQuality,
  ParticipantAudioLevel,
  RealtimeSession,
  RealtimeTransport,
  TransportEventListener,
} from "./types.js";

/** Audio capture tuned for speech: processing on, 24 kHz mono. */
export const INTERVIEW_ROOM_OPTIONS: RoomOptions = {
  adaptiveStream: true,
  dynacast: true,
  audioCaptureDefaults: {
    autoGainControl: true,
    echoCancellation: true,
    noiseSuppression: true,
    sampleRate: 24_000,
    channelCount: 1,
  },
};

export interface RemoteTrackHooks {
  /** A remote track arrived; browsers attach it to a media element here. */
  onTrackSubscribed?: (track: RemoteTrack, identity: string) => void;
  onTrackUnsubscribed?: (track: RemoteTrack, identity: string) => void;
}

function toQuality(quality: LiveKitQuality): ConnectionQuality {
  switch (quality) {
    case LiveKitQuality.Excellent:
      return "excellent";
    case LiveKitQuality.Good:
      return "good";
    case LiveKitQuality.Poor:
      return "poor";
    case LiveKitQuality.Lost:
      return "lost";
    default:
      return "unknown";
  }
}

export class LiveKitSession implements RealtimeSession {
  private readonly room: Room;
  private readonly hooks: RemoteTrackHooks;

  constructor(room: Room, hooks: RemoteTrackHooks = {}) {
    this.room = room;
    this.hooks = hooks;
  }

  async connect(url: string, token: string): Promise<void> {
    await this.room.connect(url, token);
  }

  async enableMicrophone(): Promise<void> {
    await this.room.localParticipant.setMicrophoneEnabled(true);
  }

  localAudioTrackCount(): number {
    let count = 0;
    for (const publication of this.room.localParticipant.audioTrackPublications.values()) {
      if (publication.track) count++;
    }
    return count;
  }

  localAudioLevel(): number {
    return this.room.localParticipant.audioLevel;
  }

  remoteAudioLevels(): ParticipantAudioLevel[] {
    return [...this.room.remoteParticipants.values()].map((participant) => ({
      identity: participant.identity,
      level: participant.audioLevel,
    }));
  }

  async startAudio(): Promise<void> {
    await this.room.startAudio();
  }

  async disconnect(): Promise<void> {
    await this.room.disconnect();
  }

  subscribe(listener: TransportEventListener): () => void {
    const room = this.room;

    const onParticipantConnected = (participant: RemoteParticipant) =>
      listener({ type: "participantConnected", identity: participant.identity });
    const onParticipantDisconnected = (participant: RemoteParticipant) =>
      listener({ type: "participantDisconnected", identity: participant.identity });

    const onTrackSubscribed = (track: RemoteTrack, _publication: unknown, participant: RemoteParticipant) => {
      this.hooks.onTrackSubscribed?.(track, participant.identity);
      const kind = track.kind === Track.Kind.Video ? "video" : "audio";
      listener({ type: "trackSubscribed", kind, identity: participant.identity });
    };
    const onTrackUnsubscribed = (track: RemoteTrack, _publication: unknown, participant: RemoteParticipant) => {
      this.hooks.onTrackUnsubscribed?.(track, participant.identity);
      const kind = track.kind === Track.Kind.Video ? "video" : "audio";
      listener({ type: "trackUnsubscribed", kind, identity: participant.identity });
    };

    const onDisconnected = (reason?: unknown) =>
      listener({ type: "disconnected", reason: reason === undefined ? "unknown" : String(reason) });
    const onReconnecting = () => listener({ type: "reconnecting" });
    const onReconnected = () => listener({ type: "reconnected" });
    const onQuality = (quality: LiveKitQuality, participant: Participant) =>
      listener({
        type: "connectionQualityChanged",
        quality: toQuality(quality),
        local: participant.identity === room.localParticipant.identity,
      });
    const onAudioPlayback = (playing: boolean) => listener({ type: "audioPlaybackChanged", canPlayback: playing });

    room
      .on(RoomEvent.ParticipantConnected, onParticipantConnected)
      .on(RoomEvent.ParticipantDisconnected, onParticipantDisconnected)
      .on(RoomEvent.TrackSubscribed, onTrackSubscribed)
      .on(RoomEvent.TrackUnsubscribed, onTrackUnsubscribed)
      .on(RoomEvent.Disconnected, onDisconnected)
      .on(RoomEvent.Reconnecting, onReconnecting)
      .on(RoomEvent.Reconnected, onReconnected)
      .on(RoomEvent.ConnectionQualityChanged, onQuality)
      .on(RoomEvent.AudioPlaybackStatusChanged, onAudioPlayback);

    return () => {
      room
        .off(RoomEvent.ParticipantConnected, onParticipantConnected)
        .off(RoomEvent.ParticipantDisconnected, onParticipantDisconnected)
        .off(RoomEvent.TrackSubscribed, onTrackSubscribed)
        .off(RoomEvent.TrackUnsubscribed, onTrackUnsubscribed)
        .off(RoomEvent.Disconnected, onDisconnected)
        .off(RoomEvent.Reconnecting, onReconnecting)
        .off(RoomEvent.Reconnected, onReconnected)
        .off(RoomEvent.ConnectionQualityChanged, onQuality)
        .off(RoomEvent.AudioPlaybackStatusChanged, onAudioPlayback);
    };
  }
}

export class LiveKitTransport implements RealtimeTransport {
  private readonly options: RoomOptions;
  private readonly hooks: RemoteTrackHooks;

  constructor(options: RoomOptions = INTERVIEW_ROOM_OPTIONS, hooks: RemoteTrackHooks = {}) {
    this.options = options;
    this.hooks = hooks;
  }

  createSession(): RealtimeSession {
    return new LiveKitSession(new Room(this.options), this.hooks);
  }
}
