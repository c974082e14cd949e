/**
 * Video encoder port
 *
 * Production: ffmpeg child process
 */
export interface VideoEncoderPort {
  /**
   * Encode an ordered list of JPEG frames into one MP4.
   * Playback rate is options.fps regardless of capture cadence.
   */
  encode(frames: Buffer[], options: EncodeOptions): Promise<Buffer>;

  /**
   * Whether the encoder binary is usable
   */
  isAvailable(): Promise<boolean>;
}

export interface EncodeOptions {
  fps: number;

  /** Output width; frames of another size are scaled */
  width: number;

  /** Output height */
  height: number;
}

/**
 * yuv420p needs even dimensions
 */
export function evenDimension(value: number): number {
  const even = value - (value % 2);
  return even > 0 ? even : 2;
}
