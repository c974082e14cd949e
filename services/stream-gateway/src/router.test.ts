import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  LaneQueue,
  InboundKind,
  END_OF_LANE,
  WireDisconnectedError,
  isAbortError,
} from '@streamlens/domain';
import {
  classifyInbound,
  runMessageRouter,
  createRouterStats,
  SessionLanes,
  AudioLaneMessage,
  VideoLaneMessage,
} from './router.js';
import { FakeWire } from './testing/fakes.js';

describe('classifyInbound', () => {
  it('should route typed image messages to the video lane', () => {
    expect(classifyInbound({ type: 'image', image: 'abc=' })).toEqual({
      kind: InboundKind.IMAGE_FRAME,
      image: 'abc=',
      processor: null,
      declared_type: 'image',
    });
  });

  it('should accept the typeless image format with a processor id', () => {
    expect(classifyInbound({ image: 'data:image/jpeg;base64,abc=', processor: 2 })).toEqual({
      kind: InboundKind.IMAGE_FRAME,
      image: 'data:image/jpeg;base64,abc=',
      processor: 2,
      declared_type: null,
    });
  });

  it('should read audio from the audio field', () => {
    expect(classifyInbound({ type: 'audio', audio: 'AAAA' })).toEqual({
      kind: InboundKind.AUDIO_CHUNK,
      audio: 'AAAA',
      declared_type: 'audio',
    });
  });

  it('should read audio from the audio_chunk field', () => {
    expect(classifyInbound({ type: 'audio_stream', audio_chunk: 'BBBB' })).toEqual({
      kind: InboundKind.AUDIO_CHUNK,
      audio: 'BBBB',
      declared_type: 'audio_stream',
    });
  });

  it('should treat an audio_chunk key as audio even without a type', () => {
    expect(classifyInbound({ audio_chunk: 'CCCC', image: 'ignored' })?.kind).toBe(
      InboundKind.AUDIO_CHUNK
    );
  });

  it('should recognise the stop signal', () => {
    expect(classifyInbound({ type: 'audio_stream_stop' })).toEqual({
      kind: InboundKind.AUDIO_STREAM_STOP,
    });
  });

  it('should keep audio-typed messages without payload on the audio lane', () => {
    expect(classifyInbound({ type: 'audio_stream' })).toEqual({
      kind: InboundKind.OTHER,
      declared_type: 'audio_stream',
    });
  });

  it('should drop messages that carry neither audio nor image', () => {
    expect(classifyInbound({ type: 'ping' })).toBeNull();
    expect(classifyInbound({ type: 'image', image: '' })).toBeNull();
    expect(classifyInbound({ image: 42 })).toBeNull();
    expect(classifyInbound('just a string')).toBeNull();
  });
});

describe('runMessageRouter', () => {
  let wire: FakeWire;
  let lanes: SessionLanes;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    wire = new FakeWire();
    lanes = {
      audio: new LaneQueue<AudioLaneMessage>('audio'),
      video: new LaneQueue<VideoLaneMessage>('video'),
    };
  });

  it('should demultiplex messages and close both lanes on disconnect', async () => {
    const stats = createRouterStats();
    wire.deliver({ type: 'image', image: 'frame-1' });
    wire.deliver({ type: 'audio', audio: 'pcm-1' });
    wire.deliver('{not json');
    wire.deliver({ type: 'ping' });
    wire.deliver({ image: 'frame-2', processor: 0 });
    wire.deliver({ type: 'audio_stream_stop' });
    wire.disconnect(1001);

    const error = await runMessageRouter(
      'vc_test',
      wire,
      lanes,
      stats,
      new AbortController().signal
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WireDisconnectedError);
    expect(error).toMatchObject({ code: 1001 });
    expect(stats).toEqual({ received: 6, audio: 2, video: 2, dropped: 1, malformed: 1 });

    const video: VideoLaneMessage[] = [];
    for await (const message of lanes.video.drain()) video.push(message);
    expect(video.map((m) => m.image)).toEqual(['frame-1', 'frame-2']);

    const audio: AudioLaneMessage[] = [];
    for await (const message of lanes.audio.drain()) audio.push(message);
    expect(audio.map((m) => m.kind)).toEqual([
      InboundKind.AUDIO_CHUNK,
      InboundKind.AUDIO_STREAM_STOP,
    ]);
  });

  it('should close both lanes when cancelled', async () => {
    const controller = new AbortController();
    const running = runMessageRouter('vc_test', wire, lanes, createRouterStats(), controller.signal);

    controller.abort();
    const error = await running.catch((e: unknown) => e);

    expect(isAbortError(error)).toBe(true);
    expect(await lanes.audio.get()).toBe(END_OF_LANE);
    expect(await lanes.video.get()).toBe(END_OF_LANE);
  });
});
