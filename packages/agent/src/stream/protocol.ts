import { z } from 'zod';

const CitationSchema = z.object({
  source: z.string(),
  page: z.number().optional(),
  url: z.string().optional(),
});

export const StreamChunkSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('status'),
    step: z.enum(['memory', 'generation']),
    status: z.enum(['retrieving', 'started']),
    message: z.string(),
  }),
  z.object({
    type: z.literal('tool_start'),
    tool: z.string(),
    call_id: z.string(),
    input: z.record(z.unknown()),
    status: z.string(),
  }),
  z.object({
    type: z.literal('tool_complete'),
    tool: z.string(),
    call_id: z.string(),
    status: z.enum(['completed', 'errored']),
    message: z.string(),
  }),
  z.object({
    type: z.literal('content'),
    data: z.string(),
  }),
  z.object({
    type: z.literal('sources'),
    sources: z.array(CitationSchema),
  }),
  z.object({
    type: z.literal('error'),
    code: z.string(),
    message: z.string(),
  }),
]);

export type StreamChunk = z.infer<typeof StreamChunkSchema>;
export type StreamChunkType = StreamChunk['type'];

export const SSE_DONE_FRAME = 'data: [DONE]\n\n';

export function encodeSseChunk(chunk: StreamChunk): string {
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

/** Parses an SSE body back into chunks; stops at the end marker. */
export function decodeSseStream(body: string): { chunks: StreamChunk[]; done: boolean } {
  const chunks: StreamChunk[] = [];

  for (const frame of body.split('\n\n')) {
    const line = frame.trim();
    if (!line.startsWith('data: ')) {
      continue;
    }

    const data = line.slice('data: '.length);
    if (data === '[DONE]') {
      return { chunks, done: true };
    }

    chunks.push(StreamChunkSchema.parse(JSON.parse(data)));
  }

  return { chunks, done: false };
}
