/**
 * Clip Encoder
 *
 * Buffers decoded video frames into fixed-duration windows and turns each
 * completed window into an encoded clip plus a thumbnail of its middle frame.
 *
 *   Empty -> Accumulating -> Ready -> Empty
 *
 * A window is complete once the capture time of the newest frame is at least
 * clipDurationSec after the first. flush() completes a partial window on
 * disconnect. Window length is measured in wall-clock seconds while the clip
 * is encoded at a fixed playback rate, so irregular arrival changes playback
 * speed.
 */

import sharp from 'sharp';
import { VideoEncoderPort, ClipResult, describeError } from '@streamlens/domain';

export interface ClipEncoderOptions {
  /** Window length in seconds */
  clipDurationSec: number;

  /** Playback frame rate of the encoded clip */
  fps: number;

  /** Thumbnail JPEG quality (1-100) */
  thumbnailQuality: number;
}

interface BufferedFrame {
  /** Original JPEG bytes, fed to the video encoder as-is */
  jpeg: Buffer;
  width: number;
  height: number;
  timestamp: Date;
}

export interface DecodedFrame {
  width: number;
  height: number;
}

/**
 * Fully decode a JPEG to validate it. Returns null for undecodable input.
 */
export async function decodeFrame(bytes: Buffer): Promise<DecodedFrame | null> {
  try {
    const { info } = await sharp(bytes).raw().toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height };
  } catch {
    return null;
  }
}

export class ClipEncoder {
  private frames: BufferedFrame[] = [];
  private windowStart: Date | null = null;
  private clipIndex = 0;

  constructor(
    private readonly encoder: VideoEncoderPort,
    private readonly options: ClipEncoderOptions,
    private readonly label: string = 'clip-encoder'
  ) {}

  /** Frames in the current window */
  get bufferedFrames(): number {
    return this.frames.length;
  }

  /** Index the next completed clip will carry */
  get nextClipIndex(): number {
    return this.clipIndex;
  }

  /** Seconds covered by the current window */
  get bufferedSeconds(): number {
    const last = this.frames[this.frames.length - 1];
    if (!this.windowStart || !last) {
      return 0;
    }
    return (last.timestamp.getTime() - this.windowStart.getTime()) / 1000;
  }

  /**
   * Append one frame. Returns the clip when this frame completes a window.
   * Undecodable frames are discarded and leave the window untouched.
   */
  async addFrame(bytes: Buffer, timestamp: Date): Promise<ClipResult | null> {
    const decoded = await decodeFrame(bytes);
    if (!decoded) {
      console.warn(`[Encoder] ${this.label}: failed to decode frame, discarding`);
      return null;
    }

    if (this.windowStart === null) {
      this.windowStart = timestamp;
    }

    this.frames.push({ jpeg: bytes, width: decoded.width, height: decoded.height, timestamp });

    const elapsedSec = (timestamp.getTime() - this.windowStart.getTime()) / 1000;
    if (elapsedSec >= this.options.clipDurationSec) {
      return this.completeWindow();
    }

    return null;
  }

  /**
   * Complete the current window regardless of its length. No-op when empty.
   */
  async flush(): Promise<ClipResult | null> {
    if (this.frames.length === 0) {
      return null;
    }
    console.log(`[Encoder] ${this.label}: flushing ${this.frames.length} remaining frames`);
    return this.completeWindow();
  }

  private async completeWindow(): Promise<ClipResult | null> {
    // Swap before any await so later frames land in the next window
    const frames = this.frames;
    const clipIndex = this.clipIndex;
    this.frames = [];
    this.windowStart = null;
    this.clipIndex++;

    const first = frames[0];
    const last = frames[frames.length - 1];
    const middle = frames[Math.floor(frames.length / 2)];
    if (!first || !last || !middle) {
      return null;
    }

    try {
      const thumbnail = await sharp(middle.jpeg)
        .jpeg({ quality: this.options.thumbnailQuality })
        .toBuffer();

      const video = await this.encoder.encode(
        frames.map((frame) => frame.jpeg),
        { fps: this.options.fps, width: first.width, height: first.height }
      );

      console.log(
        `[Encoder] ${this.label}: clip ${clipIndex}: ${frames.length} frames, ` +
          `${video.length} bytes, thumb ${thumbnail.length} bytes`
      );

      return {
        video,
        start_time: first.timestamp.toISOString(),
        end_time: last.timestamp.toISOString(),
        clip_index: clipIndex,
        thumbnail,
        frame_count: frames.length,
      };
    } catch (error: unknown) {
      console.error(
        `[Encoder] ${this.label}: clip ${clipIndex} lost (${frames.length} frames):`,
        describeError(error)
      );
      return null;
    }
  }
}
