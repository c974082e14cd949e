import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LaneQueue, TranscriptEvent } from '@streamlens/domain';
import { TranscriptionLink } from './transcription-link.js';
import { FakeTranscription } from './testing/fakes.js';

describe('TranscriptionLink', () => {
  let transcription: FakeTranscription;
  let link: TranscriptionLink;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    transcription = new FakeTranscription();
    link = new TranscriptionLink('vc_1', transcription, new LaneQueue<TranscriptEvent>('transcripts'));
  });

  it('should keep the session open across a stop with no audio since it opened', async () => {
    await link.send(Buffer.from([1]));
    expect(await link.stop()).toBe(true);
    expect(await link.stop()).toBe(false);

    await link.send(Buffer.from([2]));

    expect(transcription.sessions).toHaveLength(2);
    expect(link.opened).toBe(2);
    expect(link.isActive).toBe(true);
  });

  it('should not retry a failed start until the client stops', async () => {
    transcription.failStart = true;
    expect(await link.send(Buffer.from([1]))).toBe(false);

    transcription.failStart = false;
    expect(await link.send(Buffer.from([2]))).toBe(false);

    await link.stop();
    expect(await link.send(Buffer.from([3]))).toBe(true);
    expect(transcription.sessions[0].received).toEqual([Buffer.from([3])]);
  });

  it('should finish the open session on close and refuse new ones', async () => {
    await link.send(Buffer.from([1]));

    await link.close();

    expect(transcription.sessions[0].finishCalls).toBe(1);
    expect(link.isActive).toBe(false);
    expect(await link.send(Buffer.from([2]))).toBe(false);
    expect(transcription.sessions).toHaveLength(1);
  });

  it('should finish a session whose start completes after close', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const start = transcription.startSession.bind(transcription);
    vi.spyOn(transcription, 'startSession').mockImplementation(async (id, sink) => {
      await gate;
      return start(id, sink);
    });

    const sending = link.send(Buffer.from([1]));
    await link.close();
    release();

    expect(await sending).toBe(false);
    expect(transcription.sessions[0].finishCalls).toBe(1);
    expect(transcription.sessions[0].received).toEqual([]);
  });
});
