import { Value } from '@sinclair/typebox/value';

import { ToolExecutionError, TurnCancelledError, errorMessage, throwIfAborted } from '../errors.js';
import type { ToolSpec } from '../model/chat_model.js';
import type { ToolCallRequest } from '../types.js';
import { errored, type AgentTool, type ToolContext, type ToolResult } from './types.js';

/**
 * Dispatches tool requests by name. Faults inside a tool never escape: they
 * become a {@link ToolExecutionError} and come back as an `errored` result
 * whose text the model can read. A tool may throw its own ToolExecutionError
 * to choose that text. Only cancellation of the turn propagates.
 */
export class ToolExecutor {
  private readonly tools = new Map<string, AgentTool>();

  constructor(tools: AgentTool[]) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`[agent] duplicate tool name: ${tool.name}`);
      }

      this.tools.set(tool.name, tool);
    }
  }

  get specs(): ToolSpec[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
  }

  get names(): string[] {
    return Array.from(this.tools.keys());
  }

  async execute(request: ToolCallRequest, context: ToolContext): Promise<ToolResult> {
    throwIfAborted(context.signal);

    const tool = this.tools.get(request.name);
    if (!tool) {
      console.warn(`[agent] model requested unknown tool: ${request.name}`);
      return errored(`Error: unknown tool "${request.name}". Available tools: ${this.names.join(', ')}`);
    }

    const input: unknown = request.arguments;
    if (!Value.Check(tool.parameters, input)) {
      const details = [...Value.Errors(tool.parameters, input)]
        .map((issue) => `${issue.path || '(root)'}: ${issue.message}`)
        .join('; ');
      console.warn(`[agent] invalid arguments for tool ${tool.name}: ${details}`);
      return errored(`Error: invalid arguments for ${tool.name}: ${details}`);
    }

    try {
      return await tool.execute(input, context);
    } catch (error) {
      if (error instanceof TurnCancelledError || context.signal?.aborted) {
        throw error instanceof TurnCancelledError ? error : new TurnCancelledError();
      }

      const failure =
        error instanceof ToolExecutionError
          ? error
          : new ToolExecutionError(tool.name, `${tool.name} failed: ${errorMessage(error)}`, { cause: error });
      console.error(`[agent] tool ${failure.toolName} failed for user ${context.userId}: ${failure.message}`);
      return errored(`Error: ${failure.message}`);
    }
  }
}
