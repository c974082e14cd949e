/**
 * ffmpeg Video Encoder
 *
 * Implements the VideoEncoderPort interface with the system ffmpeg binary.
 * Frames are written to a scratch directory as a numbered JPEG sequence,
 * encoded to MPEG-4 Part 2 in an MP4 container, and read back into memory.
 */

import { execFile as execFileCb } from 'child_process';
import { promisify } from 'util';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { VideoEncoderPort, EncodeOptions, evenDimension } from '@streamlens/domain';

const execFile = promisify(execFileCb);

// ==================== Constants ====================

/** A 10 s window at 24 fps encodes well inside this */
const FFMPEG_ENCODE_TIMEOUT_MS = 60_000;

const FFMPEG_CHECK_TIMEOUT_MS = 5_000;

const FRAME_PATTERN = 'frame_%05d.jpg';

export interface FfmpegEncoderConfig {
  /** ffmpeg binary, resolved through PATH when not absolute */
  ffmpegPath?: string;

  /** MPEG-4 quantizer, 1 (best) to 31 */
  quality?: number;
}

export function frameFileName(index: number): string {
  return `frame_${String(index + 1).padStart(5, '0')}.jpg`;
}

export function buildEncodeArgs(
  inputPattern: string,
  outputPath: string,
  options: EncodeOptions,
  quality: number
): string[] {
  const width = evenDimension(options.width);
  const height = evenDimension(options.height);

  return [
    '-y',
    '-loglevel', 'error',
    '-framerate', String(options.fps),
    '-i', inputPattern,
    '-vf', `scale=${width}:${height}`,
    '-c:v', 'mpeg4',
    '-q:v', String(quality),
    '-pix_fmt', 'yuv420p',
    '-movflags', '+faststart',
    outputPath,
  ];
}

/**
 * ffmpeg-backed clip encoder
 */
export class FfmpegVideoEncoder implements VideoEncoderPort {
  private readonly ffmpegPath: string;
  private readonly quality: number;
  private checked = false;
  private available = false;

  constructor(config: FfmpegEncoderConfig = {}) {
    this.ffmpegPath = config.ffmpegPath ?? 'ffmpeg';
    this.quality = config.quality ?? 5;
  }

  async isAvailable(): Promise<boolean> {
    if (this.checked) {
      return this.available;
    }

    try {
      await execFile(this.ffmpegPath, ['-version'], { timeout: FFMPEG_CHECK_TIMEOUT_MS });
      this.available = true;
      console.log('[FFmpeg] ffmpeg is available');
    } catch {
      this.available = false;
      console.warn('[FFmpeg] ffmpeg is not available - clip encoding will fail');
    }

    this.checked = true;
    return this.available;
  }

  async encode(frames: Buffer[], options: EncodeOptions): Promise<Buffer> {
    if (frames.length === 0) {
      throw new Error('Cannot encode a clip without frames');
    }

    const workDir = await mkdtemp(join(tmpdir(), 'clip-'));
    try {
      await Promise.all(
        frames.map((frame, index) => writeFile(join(workDir, frameFileName(index)), frame))
      );

      const outputPath = join(workDir, 'clip.mp4');
      await execFile(
        this.ffmpegPath,
        buildEncodeArgs(join(workDir, FRAME_PATTERN), outputPath, options, this.quality),
        { timeout: FFMPEG_ENCODE_TIMEOUT_MS }
      );

      return await readFile(outputPath);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}

export function createFfmpegVideoEncoder(ffmpegPath: string): FfmpegVideoEncoder {
  return new FfmpegVideoEncoder({ ffmpegPath });
}
