import { beforeEach, describe, expect, it, vi } from 'vitest';

import { GenerationError, TransportError, TurnCancelledError } from '../src/errors.js';
import { MEMORY_DECISION_TOOL } from '../src/memory/extractor.js';
import { PiAiChatModel } from '../src/model/pi_ai_model.js';
import type { ConversationMessage } from '../src/types.js';

const { getModelMock, streamMock, completeMock } = vi.hoisted(() => ({
  getModelMock: vi.fn(),
  streamMock: vi.fn(),
  completeMock: vi.fn(),
}));

vi.mock('@mariozechner/pi-ai', () => ({
  getModel: getModelMock,
  stream: streamMock,
  complete: completeMock,
}));

interface FakeAssistantMessage {
  content: Array<
    { type: 'text'; text: string } | { type: 'toolCall'; id: string; name: string; arguments: Record<string, unknown> }
  >;
  stopReason: 'stop' | 'toolUse' | 'error' | 'aborted';
  errorMessage?: string;
}

function fakeStream(deltas: string[], message: FakeAssistantMessage) {
  return {
    async *[Symbol.asyncIterator]() {
      for (const delta of deltas) {
        yield { type: 'text_delta', delta };
      }
    },
    result: async () => message,
  };
}

function createModel(): PiAiChatModel {
  return new PiAiChatModel({ model: { provider: 'openai', id: 'gpt-test' }, apiKey: 'test-secret' });
}

describe('PiAiChatModel', () => {
  beforeEach(() => {
    getModelMock.mockReset();
    streamMock.mockReset();
    completeMock.mockReset();
    getModelMock.mockReturnValue({ id: 'gpt-test', provider: 'openai', api: 'openai-completions' });
  });

  it('replays stored tool calls and tool results as model context', async () => {
    streamMock.mockReturnValue(fakeStream([], { content: [{ type: 'text', text: 'ok' }], stopReason: 'stop' }));
    const messages: ConversationMessage[] = [
      { role: 'user', content: 'What is 2+2?', createdAtMs: 1 },
      {
        role: 'assistant',
        content: 'Let me check.',
        toolCalls: [{ id: 'c1', name: 'calculator', arguments: { expression: '2+2' } }],
        createdAtMs: 2,
      },
      { role: 'tool', content: 'Result: 4', toolName: 'calculator', toolCallId: 'c1', isError: false, createdAtMs: 3 },
      { role: 'assistant', content: 'It is 4.', createdAtMs: 4 },
    ];

    await createModel().generate({ systemPrompt: 'system', messages, tools: [] });

    expect(getModelMock).toHaveBeenCalledWith('openai', 'gpt-test');
    const [, context, options] = streamMock.mock.calls[0] ?? [];
    expect(options).toMatchObject({ apiKey: 'test-secret' });
    expect(context).toMatchObject({
      systemPrompt: 'system',
      messages: [
        { role: 'user', content: 'What is 2+2?', timestamp: 1 },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Let me check.' },
            { type: 'toolCall', id: 'c1', name: 'calculator', arguments: { expression: '2+2' } },
          ],
          api: 'openai-completions',
          provider: 'openai',
          model: 'gpt-test',
          stopReason: 'toolUse',
          timestamp: 2,
        },
        {
          role: 'toolResult',
          toolCallId: 'c1',
          toolName: 'calculator',
          content: [{ type: 'text', text: 'Result: 4' }],
          isError: false,
          timestamp: 3,
        },
        { role: 'assistant', content: [{ type: 'text', text: 'It is 4.' }], stopReason: 'stop', timestamp: 4 },
      ],
    });
  });

  it('maps tool calls to a tool_requests result', async () => {
    streamMock.mockReturnValue(
      fakeStream(['Check', 'ing'], {
        content: [
          { type: 'text', text: 'Checking' },
          { type: 'toolCall', id: 't1', name: 'search_my_documents', arguments: { query: 'budget' } },
        ],
        stopReason: 'toolUse',
      }),
    );
    const deltas: string[] = [];

    const result = await createModel().generate(
      { systemPrompt: 's', messages: [{ role: 'user', content: 'hi', createdAtMs: 1 }], tools: [] },
      { onTextDelta: (delta) => deltas.push(delta) },
    );

    expect(deltas).toEqual(['Check', 'ing']);
    expect(result).toEqual({
      kind: 'tool_requests',
      text: 'Checking',
      requests: [{ id: 't1', name: 'search_my_documents', arguments: { query: 'budget' } }],
    });
  });

  it('maps plain text to a final answer', async () => {
    streamMock.mockReturnValue(
      fakeStream(['Hi ', 'there'], {
        content: [
          { type: 'text', text: 'Hi ' },
          { type: 'text', text: 'there' },
        ],
        stopReason: 'stop',
      }),
    );

    const result = await createModel().generate({ systemPrompt: 's', messages: [], tools: [] });

    expect(result).toEqual({ kind: 'final_answer', text: 'Hi there' });
  });

  it('raises GenerationError for an error stop reason', async () => {
    streamMock.mockReturnValue(fakeStream([], { content: [], stopReason: 'error', errorMessage: 'rate limited' }));

    const attempt = createModel().generate({ systemPrompt: 's', messages: [], tools: [] });

    await expect(attempt).rejects.toBeInstanceOf(GenerationError);
    await expect(attempt).rejects.toThrow('rate limited');
  });

  it('raises TurnCancelledError for an aborted stop reason', async () => {
    streamMock.mockReturnValue(fakeStream([], { content: [], stopReason: 'aborted' }));

    await expect(createModel().generate({ systemPrompt: 's', messages: [], tools: [] })).rejects.toBeInstanceOf(
      TurnCancelledError,
    );
  });

  it('wraps a failing request in TransportError', async () => {
    streamMock.mockImplementation(() => {
      throw new Error('socket hang up');
    });

    const attempt = createModel().generate({ systemPrompt: 's', messages: [], tools: [] });

    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toThrow('model: chat request failed: socket hang up');
  });

  it('returns validated arguments of a forced tool call', async () => {
    const payload = { should_write: true, memories: [{ text: 'Likes tea', is_new: true }] };
    completeMock.mockResolvedValue({
      content: [{ type: 'toolCall', id: 'm1', name: 'record_memory_decision', arguments: payload }],
      stopReason: 'toolUse',
    });

    const args = await createModel().callTool({ systemPrompt: 's', userText: 'I like tea', tool: MEMORY_DECISION_TOOL });

    expect(args).toEqual(payload);
    expect(completeMock.mock.calls[0]?.[1]).toMatchObject({
      messages: [{ role: 'user', content: 'I like tea' }],
      tools: [{ name: 'record_memory_decision' }],
    });
  });

  it('rejects forced tool calls that are missing or malformed', async () => {
    completeMock.mockResolvedValueOnce({ content: [{ type: 'text', text: 'no' }], stopReason: 'stop' });
    await expect(
      createModel().callTool({ systemPrompt: 's', userText: 'x', tool: MEMORY_DECISION_TOOL }),
    ).rejects.toThrow('Model did not call required tool: record_memory_decision');

    completeMock.mockResolvedValueOnce({
      content: [{ type: 'toolCall', id: 'm1', name: 'record_memory_decision', arguments: { should_write: 'yes' } }],
      stopReason: 'toolUse',
    });
    await expect(
      createModel().callTool({ systemPrompt: 's', userText: 'x', tool: MEMORY_DECISION_TOOL }),
    ).rejects.toThrow('Invalid tool arguments from model for record_memory_decision');
  });
});
