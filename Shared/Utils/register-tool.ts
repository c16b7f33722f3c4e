/**
 * Tool registration wrapper for McpServer.
 *
 * Handlers return a StandardResponse; the wrapper serialises it into MCP text
 * content, and turns thrown errors into an error StandardResponse flagged with
 * `isError` so clients can tell a failed call from a failed result.
 */

import type { z } from 'zod';
import type { StandardResponse } from '../Types/StandardResponse.js';
import { createErrorFromException } from '../Types/StandardResponse.js';
import { Logger } from './logger.js';

/**
 * Structural view of McpServer.registerTool, so this package does not pin an SDK version.
 */
interface McpServerLike {
  registerTool(...args: unknown[]): unknown;
}

interface ToolAnnotations extends Record<string, unknown> {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface ToolCallResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

const toolLogger = new Logger('tools');

export function registerTool<T extends z.AnyZodObject>(
  server: McpServerLike,
  config: {
    name: string;
    description: string;
    inputSchema: T;
    annotations?: ToolAnnotations;
    handler: (input: z.infer<T>) => Promise<StandardResponse>;
  },
): void {
  server.registerTool(
    config.name,
    {
      description: config.description,
      inputSchema: config.inputSchema.shape,
      annotations: config.annotations,
    },
    async (args: Record<string, unknown>): Promise<ToolCallResult> => {
      try {
        // The SDK has already validated args against the shape; parsing again
        // applies defaults and transforms declared on the schema.
        const input = config.inputSchema.parse(args);
        const result = await config.handler(input);
        return { content: [{ type: 'text', text: JSON.stringify(result) }] };
      } catch (error) {
        toolLogger.warn(`Tool ${config.name} failed`, error);
        const response = createErrorFromException(error, false);
        return { content: [{ type: 'text', text: JSON.stringify(response) }], isError: true };
      }
    },
  );
}
