import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ClipResult, isAbortError } from '@streamlens/domain';
import { UploadPipeline } from './upload-pipeline.js';
import { FakeStorage, FakeClipRepository } from './testing/fakes.js';

function clipResult(index: number, thumbnail: Buffer | null = Buffer.from(`thumb-${index}`)): ClipResult {
  return {
    video: Buffer.from(`video-${index}`),
    start_time: `2024-05-01T12:00:${String(index * 10).padStart(2, '0')}.000Z`,
    end_time: `2024-05-01T12:00:${String(index * 10 + 9).padStart(2, '0')}.000Z`,
    clip_index: index,
    thumbnail,
    frame_count: 240,
  };
}

describe('UploadPipeline', () => {
  let storage: FakeStorage;
  let clips: FakeClipRepository;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    storage = new FakeStorage();
    clips = new FakeClipRepository();
  });

  it('should store clip, thumbnail and row in queue order', async () => {
    const pipeline = new UploadPipeline('vc_1', 'clips', { storage, clips });
    pipeline.enqueue(clipResult(0));
    pipeline.enqueue(clipResult(1));
    pipeline.close();

    const stats = await pipeline.run(new AbortController().signal);

    expect(stats).toEqual({ received: 2, uploaded: 2, failed: 0, skipped: 0 });
    expect(storage.objects.map((o) => o.key)).toEqual([
      'vc_1/clips/clip_0000.mp4',
      'vc_1/thumbnails/thumb_0000.jpg',
      'vc_1/clips/clip_0001.mp4',
      'vc_1/thumbnails/thumb_0001.jpg',
    ]);
    expect(storage.objects[0]).toMatchObject({
      bucket: 'clips',
      contentType: 'video/mp4',
      metadata: {
        start_time: '2024-05-01T12:00:00.000Z',
        end_time: '2024-05-01T12:00:09.000Z',
        session_id: 'vc_1',
      },
    });
    expect(storage.objects[1].contentType).toBe('image/jpeg');
    expect(clips.rows[1]).toMatchObject({
      session_id: 'vc_1',
      clip_index: 1,
      s3_key: 'vc_1/clips/clip_0001.mp4',
      s3_bucket: 'clips',
      start_time: new Date('2024-05-01T12:00:10.000Z'),
      end_time: new Date('2024-05-01T12:00:19.000Z'),
      thumbnail_s3_key: 'vc_1/thumbnails/thumb_0001.jpg',
    });
    expect(pipeline.latest.current).toEqual({
      s3_key: 'vc_1/clips/clip_0001.mp4',
      s3_bucket: 'clips',
      start_time: '2024-05-01T12:00:10.000Z',
      end_time: '2024-05-01T12:00:19.000Z',
      thumbnail_s3_key: 'vc_1/thumbnails/thumb_0001.jpg',
    });
  });

  it('should skip the thumbnail upload when there is none', async () => {
    const pipeline = new UploadPipeline('vc_1', 'clips', { storage, clips });
    pipeline.enqueue(clipResult(0, null));
    pipeline.close();

    await pipeline.run(new AbortController().signal);

    expect(storage.objects).toHaveLength(1);
    expect(clips.rows[0].thumbnail_s3_key).toBeNull();
  });

  it('should drop every clip when no bucket is configured', async () => {
    const pipeline = new UploadPipeline('vc_1', null, { storage, clips });
    pipeline.enqueue(clipResult(0));
    pipeline.enqueue(clipResult(1));
    pipeline.close();

    const stats = await pipeline.run(new AbortController().signal);

    expect(stats).toEqual({ received: 2, uploaded: 0, failed: 0, skipped: 2 });
    expect(storage.objects).toHaveLength(0);
    expect(clips.rows).toHaveLength(0);
    expect(pipeline.latest.current).toBeNull();
  });

  it('should log a failed clip and carry on with the next', async () => {
    storage.failKeys.add('vc_1/thumbnails/thumb_0000.jpg');
    const pipeline = new UploadPipeline('vc_1', 'clips', { storage, clips });
    pipeline.enqueue(clipResult(0));
    pipeline.enqueue(clipResult(1));
    pipeline.close();

    const stats = await pipeline.run(new AbortController().signal);

    expect(stats.failed).toBe(1);
    expect(stats.uploaded).toBe(1);
    expect(clips.rows.map((row) => row.clip_index)).toEqual([1]);
    expect(pipeline.latest.current?.s3_key).toBe('vc_1/clips/clip_0001.mp4');
  });

  it('should wait for clips until its sentinel arrives', async () => {
    const pipeline = new UploadPipeline('vc_1', 'clips', { storage, clips });
    const running = pipeline.run(new AbortController().signal);

    pipeline.enqueue(clipResult(0));
    pipeline.close();

    expect((await running).uploaded).toBe(1);
  });

  it('should stop when cancelled while idle', async () => {
    const controller = new AbortController();
    const pipeline = new UploadPipeline('vc_1', 'clips', { storage, clips });
    const running = pipeline.run(controller.signal).catch((e: unknown) => e);

    controller.abort();

    expect(isAbortError(await running)).toBe(true);
  });

  it('should abandon an in-flight upload when cancelled', async () => {
    const controller = new AbortController();
    vi.spyOn(storage, 'putObject').mockImplementation(
      (_bucket, _key, _data, _type, _metadata, signal) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(controller.signal.reason));
        })
    );
    const pipeline = new UploadPipeline('vc_1', 'clips', { storage, clips });
    pipeline.enqueue(clipResult(0));
    const running = pipeline.run(controller.signal).catch((e: unknown) => e);

    await vi.waitFor(() => expect(storage.putObject).toHaveBeenCalledTimes(1));
    controller.abort();

    expect(isAbortError(await running)).toBe(true);
    expect(pipeline.stats).toEqual({ received: 1, uploaded: 0, failed: 0, skipped: 0 });
    expect(clips.rows).toHaveLength(0);
  });
});
