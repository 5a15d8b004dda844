import { AgentError, TurnCancelledError, errorMessage } from '../errors.js';
import type { ConversationEngine } from '../graph/state_machine.js';
import type { TurnEvent, TurnRequest } from '../graph/events.js';
import { AsyncChannel } from './channel.js';
import type { StreamChunk } from './protocol.js';

type ChannelItem = { kind: 'event'; event: TurnEvent } | { kind: 'failed'; error: unknown } | { kind: 'cancelled' };

function errorChunk(error: unknown): StreamChunk {
  return {
    type: 'error',
    code: error instanceof AgentError ? error.code : 'INTERNAL_ERROR',
    message: errorMessage(error),
  };
}

export interface MultiplexOptions {
  signal?: AbortSignal;
}

/**
 * Streams one turn as consumer-facing chunks. The engine runs ahead and pushes
 * into a channel; text of each generation step is held back until the step
 * turns out to be the final answer. Stopping early (return() or the caller's
 * signal) aborts the turn without waiting for it to unwind; it then commits
 * nothing.
 */
export async function* multiplexTurn(
  engine: ConversationEngine,
  request: TurnRequest,
  options: MultiplexOptions = {},
): AsyncGenerator<StreamChunk, void, undefined> {
  const controller = new AbortController();
  const channel = new AsyncChannel<ChannelItem>();
  const onAbort = () => {
    controller.abort();
    channel.push({ kind: 'cancelled' });
  };
  if (options.signal?.aborted) {
    onAbort();
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true });
  }

  const running = engine
    .run(request, (event) => channel.push({ kind: 'event', event }), controller.signal)
    .then(
      () => channel.close(),
      (error: unknown) => {
        channel.push({ kind: 'failed', error });
        channel.close();
      },
    );

  let generationStarted = false;
  let buffered: string[] = [];
  let settled = false;

  try {
    for await (const item of channel) {
      if (item.kind === 'cancelled' || options.signal?.aborted) {
        console.log(`[agent] turn cancelled by caller user=${request.userId} thread=${request.threadId}`);
        return;
      }

      if (item.kind === 'failed') {
        settled = true;
        if (item.error instanceof TurnCancelledError && controller.signal.aborted) {
          console.log(`[agent] turn cancelled user=${request.userId} thread=${request.threadId}`);
          return;
        }

        console.error(`[agent] turn failed user=${request.userId} thread=${request.threadId}: ${errorMessage(item.error)}`);
        yield errorChunk(item.error);
        return;
      }

      const event = item.event;
      switch (event.type) {
        case 'status':
          yield { type: 'status', step: 'memory', status: 'retrieving', message: 'Retrieving your memory...' };
          break;
        case 'generation_step':
          buffered = [];
          break;
        case 'text_delta':
          buffered.push(event.delta);
          break;
        case 'step_resolved': {
          const parts = (buffered.length > 0 ? buffered : [event.text]).filter((part) => part.length > 0);
          buffered = [];
          if (event.kind !== 'final_answer') {
            break;
          }

          if (!generationStarted) {
            generationStarted = true;
            yield { type: 'status', step: 'generation', status: 'started', message: 'Generating response...' };
          }
          // An empty answer is still delivered as one content chunk.
          for (const part of parts.length > 0 ? parts : ['']) {
            yield { type: 'content', data: part };
          }
          break;
        }
        case 'tool_start':
          yield {
            type: 'tool_start',
            tool: event.tool,
            call_id: event.callId,
            input: event.input,
            status: `Using ${event.tool}...`,
          };
          break;
        case 'tool_complete':
          yield {
            type: 'tool_complete',
            tool: event.tool,
            call_id: event.callId,
            status: event.status,
            message: event.status === 'completed' ? 'Tool execution complete' : 'Tool execution failed',
          };
          break;
        case 'sources':
          yield { type: 'sources', sources: event.sources };
          break;
        case 'state':
        case 'memory':
          break;
      }
    }
    settled = true;
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
    if (settled) {
      await running;
    } else {
      // In-flight work is abandoned; the aborted engine commits nothing when it unwinds.
      controller.abort();
      void running;
    }
  }
}
