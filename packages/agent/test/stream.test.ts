import { describe, expect, it } from 'vitest';

import { AsyncChannel } from '../src/stream/channel.js';
import { SSE_DONE_FRAME, decodeSseStream, encodeSseChunk } from '../src/stream/protocol.js';

describe('AsyncChannel', () => {
  it('delivers items pushed before and after the reader waits', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.push(2);

    const reading = (async () => {
      const items: number[] = [];
      for await (const item of channel) {
        items.push(item);
      }
      return items;
    })();

    await Promise.resolve();
    channel.push(3);
    channel.close();

    expect(await reading).toEqual([1, 2, 3]);
  });

  it('never blocks the producer', () => {
    const channel = new AsyncChannel<string>();
    for (let index = 0; index < 1000; index += 1) {
      channel.push(`event-${index}`);
    }

    expect(channel.size).toBe(1000);
  });

  it('refuses pushes after close', async () => {
    const channel = new AsyncChannel<string>();
    channel.close();

    expect(channel.push('late')).toBe(false);
    expect(await channel.next()).toEqual({ value: undefined, done: true });
  });
});

describe('SSE framing', () => {
  it('encodes chunks as data frames', () => {
    expect(encodeSseChunk({ type: 'content', data: 'hi' })).toBe('data: {"type":"content","data":"hi"}\n\n');
    expect(SSE_DONE_FRAME).toBe('data: [DONE]\n\n');
  });

  it('decodes frames up to the end marker', () => {
    const body = `${encodeSseChunk({ type: 'content', data: 'a' })}${SSE_DONE_FRAME}`;

    expect(decodeSseStream(body)).toEqual({ chunks: [{ type: 'content', data: 'a' }], done: true });
  });
});
