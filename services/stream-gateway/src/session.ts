/**
 * Session Orchestrator
 *
 * Owns everything that lives for one client connection: the lanes, the clip
 * encoder, the upload pipeline, the annotation batcher and the live
 * transcription. Runs them as concurrent activities and shuts them down in a
 * fixed order once the first one ends (normally the router, on disconnect):
 *
 *   1. stop intake; the router closes both lanes with their sentinel
 *   2. give the audio lane, video lane and upload worker a grace period to
 *      drain what is already queued
 *   3. finish the transcription so its last results reach the relay
 *   4. cancel whatever is still running (batch timer, stalled drainers) and
 *      wait one more grace period; activities stuck in a collaborator call
 *      are reported cancelled and left behind
 *   5. teardown: final annotation flush, close the wire
 *
 * Teardown runs exactly once on every exit path.
 */

import { setTimeout as sleep } from 'timers/promises';
import {
  WireConnection,
  StoragePort,
  ClipRepositoryPort,
  TranscriptionPort,
  VisionPort,
  FrameCaptioner,
  CaptionEvent,
  MemoryPort,
  VideoEncoderPort,
  PipelineConfig,
  LaneQueue,
  TranscriptEvent,
  ActivityOutcome,
  FlushReason,
  isAbortError,
  isWireDisconnected,
  describeError,
} from '@streamlens/domain';
import {
  runMessageRouter,
  createRouterStats,
  RouterStats,
  SessionLanes,
  AudioLaneMessage,
  VideoLaneMessage,
} from './router.js';
import { runAudioLane, createAudioLaneStats, AudioLaneStats } from './audio-lane.js';
import { runVideoLane, createVideoLaneStats, VideoLaneStats } from './video-lane.js';
import {
  runTranscriptRelay,
  createTranscriptRelayStats,
  TranscriptRelayStats,
} from './transcript-relay.js';
import { ClipEncoder } from './clip-encoder.js';
import { UploadPipeline, UploadStats } from './upload-pipeline.js';
import { AnnotationBatcher, BatcherStats } from './annotation-batcher.js';
import { TranscriptionLink } from './transcription-link.js';

// ==================== Types ====================

export interface SessionAdapters {
  storage: StoragePort;
  clips: ClipRepositoryPort;
  transcription: TranscriptionPort;
  vision: VisionPort;
  memory: MemoryPort;
  videoEncoder: VideoEncoderPort;
}

export interface SessionSettings {
  /** Clip bucket; null disables clip persistence for the session */
  bucket: string | null;

  /** Long-term memory owner */
  userScope: string;

  pipeline: PipelineConfig;
}

export type SessionState = 'starting' | 'running' | 'draining' | 'closed';

export type ActivityName = 'router' | 'audio' | 'video' | 'upload' | 'transcripts' | 'batcher';

export interface ActivityReport {
  name: ActivityName;
  outcome: ActivityOutcome;
  detail?: string;
}

export interface VisionStats {
  frames_seen: number;
  captions: CaptionEvent[];
}

export interface SessionStats {
  session_id: string;
  connection_id: string;
  accepted_at: string;
  state: SessionState;
  transcription_active: boolean;
  transcription_sessions: number;
  router: RouterStats;
  audio: AudioLaneStats;
  video: VideoLaneStats;
  uploads: UploadStats;
  transcripts: TranscriptRelayStats;
  memory: BatcherStats;
  vision: VisionStats;
}

/**
 * Unique per connection, stable for the session's lifetime
 */
export function createSessionId(connectionId: string, acceptedAt: Date): string {
  return `vc_${connectionId}_${Math.floor(acceptedAt.getTime() / 1000)}`;
}

const ACTIVITY_NAMES: readonly ActivityName[] = [
  'router',
  'audio',
  'video',
  'upload',
  'transcripts',
  'batcher',
];

function track(name: ActivityName, activity: Promise<unknown>): Promise<ActivityReport> {
  return activity.then(
    () => ({ name, outcome: ActivityOutcome.COMPLETED }),
    (error: unknown) => {
      if (isWireDisconnected(error)) {
        return { name, outcome: ActivityOutcome.DISCONNECTED, detail: `code=${error.code}` };
      }
      if (isAbortError(error)) {
        return { name, outcome: ActivityOutcome.CANCELLED };
      }
      return { name, outcome: ActivityOutcome.FAILED, detail: describeError(error) };
    }
  );
}

/**
 * Resolve true when every activity settled within timeoutMs, false otherwise
 */
async function settleWithin(
  activities: Array<Promise<ActivityReport>>,
  timeoutMs: number
): Promise<boolean> {
  const timer = new AbortController();
  try {
    return await Promise.race([
      Promise.all(activities).then(() => true),
      sleep(timeoutMs, false, { signal: timer.signal }),
    ]);
  } finally {
    timer.abort();
  }
}

// ==================== Session ====================

export class StreamSession {
  readonly id: string;
  readonly acceptedAt: Date;

  private state: SessionState = 'starting';
  private readonly intake = new AbortController();
  private readonly lifetime = new AbortController();
  private readonly lanes: SessionLanes = {
    audio: new LaneQueue<AudioLaneMessage>('audio'),
    video: new LaneQueue<VideoLaneMessage>('video'),
  };
  private readonly transcriptSink = new LaneQueue<TranscriptEvent>('transcripts');
  private readonly encoder: ClipEncoder;
  private readonly uploads: UploadPipeline;
  private readonly batcher: AnnotationBatcher;
  private readonly transcription: TranscriptionLink;
  private readonly captioner: FrameCaptioner;
  private readonly settled = new Map<ActivityName, ActivityReport>();
  private teardownPromise: Promise<void> | null = null;

  private readonly routerStats = createRouterStats();
  private readonly audioStats = createAudioLaneStats();
  private readonly videoStats = createVideoLaneStats();
  private readonly relayStats = createTranscriptRelayStats();

  constructor(
    private readonly wire: WireConnection,
    private readonly adapters: SessionAdapters,
    private readonly settings: SessionSettings,
    acceptedAt: Date = new Date()
  ) {
    this.acceptedAt = acceptedAt;
    this.id = createSessionId(wire.connectionId, acceptedAt);

    const { pipeline } = settings;
    this.encoder = new ClipEncoder(
      adapters.videoEncoder,
      {
        clipDurationSec: pipeline.clipDurationSec,
        fps: pipeline.clipFps,
        thumbnailQuality: pipeline.thumbnailQuality,
      },
      this.id
    );
    this.uploads = new UploadPipeline(this.id, settings.bucket, {
      storage: adapters.storage,
      clips: adapters.clips,
    });
    this.transcription = new TranscriptionLink(
      this.id,
      adapters.transcription,
      this.transcriptSink
    );
    this.captioner = adapters.vision.createCaptioner(this.id);
    this.batcher = new AnnotationBatcher(adapters.memory, {
      sessionId: this.id,
      userScope: settings.userScope,
      intervalMs: pipeline.batchIntervalMs,
    });
  }

  get currentState(): SessionState {
    return this.state;
  }

  /**
   * Run the session until the connection ends. Resolves with every
   * activity's outcome; never rejects for per-activity failures.
   */
  async run(): Promise<ActivityReport[]> {
    console.log(`[Session] ${this.id}: started`);

    try {
      this.state = 'running';

      const signal = this.lifetime.signal;
      const router = this.track(
        'router',
        runMessageRouter(this.id, this.wire, this.lanes, this.routerStats, this.intake.signal)
      );
      const audio = this.track(
        'audio',
        runAudioLane(this.id, this.lanes.audio, this.transcription, this.audioStats, signal)
      );
      const video = this.track(
        'video',
        runVideoLane(
          this.id,
          this.lanes.video,
          {
            encoder: this.encoder,
            captioner: this.captioner,
            uploads: this.uploads,
            batcher: this.batcher,
            wire: this.wire,
          },
          this.videoStats,
          signal
        )
      );
      const upload = this.track('upload', this.uploads.run(signal));
      const relay = this.track(
        'transcripts',
        runTranscriptRelay(
          this.id,
          this.transcriptSink,
          this.wire,
          this.batcher,
          this.relayStats,
          signal
        )
      );
      const timer = this.track('batcher', this.batcher.run(signal));
      const activities = [router, audio, video, upload, relay, timer];

      const first = await Promise.race(activities);
      console.log(`[Session] ${this.id}: ${first.name} ended first (${first.outcome})`);

      this.state = 'draining';
      this.intake.abort();

      const { drainTimeoutMs } = this.settings.pipeline;
      if (!(await settleWithin([audio, video, upload], drainTimeoutMs))) {
        console.warn(`[Session] ${this.id}: lanes did not drain within ${drainTimeoutMs}ms`);
      }

      await this.transcription.close();
      this.transcriptSink.close();
      if (!(await settleWithin([relay], drainTimeoutMs))) {
        console.warn(`[Session] ${this.id}: transcript relay did not drain`);
      }

      this.lifetime.abort();
      if (!(await settleWithin(activities, drainTimeoutMs))) {
        console.warn(`[Session] ${this.id}: activities still blocked after cancellation`);
      }
      const reports = ACTIVITY_NAMES.map(
        (name): ActivityReport =>
          this.settled.get(name) ?? {
            name,
            outcome: ActivityOutcome.CANCELLED,
            detail: `did not stop within ${drainTimeoutMs}ms`,
          }
      );
      for (const report of reports) {
        this.logReport(report);
      }
      return reports;
    } finally {
      await this.teardown();
    }
  }

  /**
   * Ask the session to wind down as if the client had disconnected
   */
  stop(reason: string): void {
    if (!this.intake.signal.aborted) {
      console.log(`[Session] ${this.id}: stopping (${reason})`);
      this.intake.abort();
    }
  }

  /**
   * Idempotent; concurrent callers share one run
   */
  teardown(): Promise<void> {
    if (!this.teardownPromise) {
      this.teardownPromise = this.runTeardown();
    }
    return this.teardownPromise;
  }

  getStats(): SessionStats {
    return {
      session_id: this.id,
      connection_id: this.wire.connectionId,
      accepted_at: this.acceptedAt.toISOString(),
      state: this.state,
      transcription_active: this.transcription.isActive,
      transcription_sessions: this.transcription.opened,
      router: { ...this.routerStats },
      audio: { ...this.audioStats },
      video: { ...this.videoStats },
      uploads: { ...this.uploads.stats },
      transcripts: { ...this.relayStats },
      memory: { ...this.batcher.stats },
      vision: {
        frames_seen: this.captioner.frameCount,
        captions: this.captioner.getHistory(),
      },
    };
  }

  // ==================== Internals ====================

  private track(name: ActivityName, activity: Promise<unknown>): Promise<ActivityReport> {
    return track(name, activity).then((report) => {
      this.settled.set(name, report);
      return report;
    });
  }

  private async runTeardown(): Promise<void> {
    this.intake.abort();
    this.lifetime.abort();

    await this.transcription.close();
    this.transcriptSink.close();

    await this.batcher.flush(FlushReason.TEARDOWN);
    this.batcher.logSummary();

    this.wire.close();
    this.state = 'closed';
    console.log(`[Session] ${this.id}: closed`);
  }

  private logReport(report: ActivityReport): void {
    const line = `[Session] ${this.id}: ${report.name} -> ${report.outcome}`;
    if (report.outcome === ActivityOutcome.FAILED) {
      console.error(`${line}: ${report.detail ?? 'unknown error'}`);
    } else {
      console.log(report.detail ? `${line} (${report.detail})` : line);
    }
  }
}
