/**
 * Transcription Link
 *
 * Opens live transcription sessions on demand for one connection. A session
 * is opened by the first chunk after a stop (or the first chunk overall) and
 * ended by the next stop that follows at least one forwarded chunk. Every
 * session writes into the same sink, so the relay sees one ordered stream.
 */

import {
  LaneQueue,
  TranscriptEvent,
  TranscriptionPort,
  TranscriptionSession,
  describeError,
} from '@streamlens/domain';

export class TranscriptionLink {
  private current: TranscriptionSession | null = null;
  private chunksSinceOpen = 0;
  private sessionsOpened = 0;
  private startFailed = false;
  private warnedUnconfigured = false;
  private closed = false;

  constructor(
    private readonly sessionId: string,
    private readonly port: TranscriptionPort,
    private readonly sink: LaneQueue<TranscriptEvent>
  ) {}

  get isActive(): boolean {
    return this.current?.isActive ?? false;
  }

  /** Provider sessions opened so far */
  get opened(): number {
    return this.sessionsOpened;
  }

  /**
   * Forward one chunk, opening a session first when none is open.
   * Resolves false when no session could be opened; send errors reject.
   */
  async send(audio: Buffer): Promise<boolean> {
    const session = await this.acquire();
    if (!session) {
      return false;
    }
    await session.send(audio);
    this.chunksSinceOpen++;
    return true;
  }

  /**
   * Client stop. Ends the open session only if audio was sent on it;
   * resolves true when a session was ended.
   */
  async stop(): Promise<boolean> {
    // a failed start may be retried once the client restarts its stream
    this.startFailed = false;

    if (!this.current?.isActive || this.chunksSinceOpen === 0) {
      return false;
    }
    await this.end();
    return true;
  }

  /**
   * End the open session, if any, and refuse to open new ones
   */
  async close(): Promise<void> {
    this.closed = true;
    try {
      await this.end();
    } catch (error: unknown) {
      console.error(
        `[Transcription] ${this.sessionId}: error finishing transcription:`,
        describeError(error)
      );
    }
  }

  private async end(): Promise<void> {
    const session = this.current;
    this.current = null;
    this.chunksSinceOpen = 0;
    if (session?.isActive) {
      await session.finish();
    }
  }

  private async acquire(): Promise<TranscriptionSession | null> {
    if (this.current?.isActive) {
      return this.current;
    }
    this.current = null;
    this.chunksSinceOpen = 0;

    if (this.closed || this.startFailed) {
      return null;
    }
    if (!this.port.isConfigured()) {
      if (!this.warnedUnconfigured) {
        this.warnedUnconfigured = true;
        console.warn(`[Transcription] ${this.sessionId}: not configured, audio will be dropped`);
      }
      return null;
    }

    let session: TranscriptionSession;
    try {
      session = await this.port.startSession(this.sessionId, this.sink);
    } catch (error: unknown) {
      this.startFailed = true;
      console.error(
        `[Transcription] ${this.sessionId}: failed to start, audio dropped until next stop:`,
        describeError(error)
      );
      return null;
    }

    this.sessionsOpened++;
    if (this.closed) {
      await session.finish();
      return null;
    }
    this.current = session;
    console.log(`[Transcription] ${this.sessionId}: session #${this.sessionsOpened} opened`);
    return session;
  }
}
