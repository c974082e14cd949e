import { describe, it, expect, vi, beforeAll, beforeEach } from 'vitest';
import sharp from 'sharp';
import { ClipEncoder, decodeFrame } from './clip-encoder.js';
import { FakeVideoEncoder, solidJpeg } from './testing/fakes.js';

const base = new Date('2024-01-01T00:00:00.000Z');

function at(ms: number): Date {
  return new Date(base.getTime() + ms);
}

describe('ClipEncoder', () => {
  let frame: Buffer;
  let videoEncoder: FakeVideoEncoder;
  let encoder: ClipEncoder;

  beforeAll(async () => {
    frame = await solidJpeg({ r: 120, g: 120, b: 120 });
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    videoEncoder = new FakeVideoEncoder();
    encoder = new ClipEncoder(videoEncoder, { clipDurationSec: 10, fps: 24, thumbnailQuality: 80 });
  });

  it('should emit one clip for 241 frames spanning exactly ten seconds at 24 fps', async () => {
    const emitted: number[] = [];

    for (let i = 0; i <= 240; i++) {
      const clip = await encoder.addFrame(frame, at(Math.round((i * 1000) / 24)));
      if (clip) {
        emitted.push(i);
        expect(clip.clip_index).toBe(0);
        expect(clip.frame_count).toBe(241);
        expect(clip.start_time).toBe('2024-01-01T00:00:00.000Z');
        expect(clip.end_time).toBe('2024-01-01T00:00:10.000Z');
        expect(clip.video.toString()).toBe('mp4:241');
      }
    }

    expect(emitted).toEqual([240]);
    expect(videoEncoder.calls[0].options).toEqual({ fps: 24, width: 16, height: 16 });
    expect(encoder.bufferedFrames).toBe(0);

    expect(await encoder.addFrame(frame, at(10042))).toBeNull();
    const next = await encoder.flush();
    expect(next?.clip_index).toBe(1);
    expect(next?.frame_count).toBe(1);
    expect(next?.start_time).toBe('2024-01-01T00:00:10.042Z');
  });

  it('should count only the frames appended since the previous clip', async () => {
    expect(await encoder.addFrame(frame, at(0))).toBeNull();
    expect(await encoder.addFrame(frame, at(4000))).toBeNull();
    const first = await encoder.addFrame(frame, at(11000));
    expect(await encoder.addFrame(frame, at(12000))).toBeNull();
    const second = await encoder.addFrame(frame, at(22000));

    expect(first?.frame_count).toBe(3);
    expect(first?.clip_index).toBe(0);
    expect(second?.frame_count).toBe(2);
    expect(second?.clip_index).toBe(1);
    expect(second?.start_time).toBe('2024-01-01T00:00:12.000Z');
  });

  describe('flush', () => {
    it('should return nothing for an empty buffer', async () => {
      expect(await encoder.flush()).toBeNull();
      expect(videoEncoder.calls).toHaveLength(0);
      expect(encoder.nextClipIndex).toBe(0);
    });

    it('should emit a short clip with every buffered frame', async () => {
      await encoder.addFrame(frame, at(0));
      await encoder.addFrame(frame, at(500));
      await encoder.addFrame(frame, at(900));

      const clip = await encoder.flush();

      expect(clip?.frame_count).toBe(3);
      expect(clip?.clip_index).toBe(0);
      expect(clip?.end_time).toBe('2024-01-01T00:00:00.900Z');
      expect(await encoder.flush()).toBeNull();
    });
  });

  it('should take the thumbnail from position len/2 of the window', async () => {
    const colors = [
      { r: 255, g: 0, b: 0 },
      { r: 0, g: 255, b: 0 },
      { r: 0, g: 0, b: 255 },
      { r: 255, g: 255, b: 255 },
    ];
    for (const [i, color] of colors.entries()) {
      await encoder.addFrame(await solidJpeg(color), at(i * 100));
    }

    const clip = await encoder.flush();
    expect(clip?.thumbnail).not.toBeNull();

    const { channels } = await sharp(clip?.thumbnail ?? Buffer.alloc(0)).stats();
    // frame 2 of 4 is blue
    expect(channels[0].mean).toBeLessThan(40);
    expect(channels[1].mean).toBeLessThan(40);
    expect(channels[2].mean).toBeGreaterThan(215);
  });

  it('should discard undecodable frames without touching the window', async () => {
    await encoder.addFrame(frame, at(0));

    expect(await encoder.addFrame(Buffer.from('not a jpeg'), at(10000))).toBeNull();
    expect(encoder.bufferedFrames).toBe(1);
    expect(encoder.nextClipIndex).toBe(0);

    const clip = await encoder.addFrame(frame, at(10500));
    expect(clip?.frame_count).toBe(2);
  });

  it('should lose the clip but advance the index when encoding fails', async () => {
    videoEncoder.fail = true;
    await encoder.addFrame(frame, at(0));

    expect(await encoder.addFrame(frame, at(10000))).toBeNull();
    expect(encoder.nextClipIndex).toBe(1);
    expect(encoder.bufferedFrames).toBe(0);

    videoEncoder.fail = false;
    await encoder.addFrame(frame, at(11000));
    expect((await encoder.flush())?.clip_index).toBe(1);
  });
});

describe('decodeFrame', () => {
  it('should report dimensions of a valid JPEG', async () => {
    expect(await decodeFrame(await solidJpeg({ r: 1, g: 2, b: 3 }, 32, 8))).toEqual({
      width: 32,
      height: 8,
    });
  });

  it('should return null for garbage', async () => {
    expect(await decodeFrame(Buffer.from([0xff, 0xd8, 0x00]))).toBeNull();
  });
});
