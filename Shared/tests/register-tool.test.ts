import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { registerTool, type ToolCallResult } from '../Utils/register-tool.js';
import { ValidationError } from '../Types/errors.js';

function createMockServer() {
  return { registerTool: vi.fn() };
}

type RegisteredHandler = (args: Record<string, unknown>) => Promise<ToolCallResult>;

function registeredHandler(server: ReturnType<typeof createMockServer>): RegisteredHandler {
  return server.registerTool.mock.calls[0][2];
}

describe('registerTool', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should pass name, description, shape and annotations to the server', () => {
    const server = createMockServer();
    const schema = z.object({ code: z.string(), timeout_ms: z.number().optional() });
    const annotations = { readOnlyHint: false, destructiveHint: true };

    registerTool(server, {
      name: 'execute_code',
      description: 'Run code',
      inputSchema: schema,
      annotations,
      handler: async () => ({ success: true }),
    });

    expect(server.registerTool).toHaveBeenCalledOnce();
    const [name, config] = server.registerTool.mock.calls[0];
    expect(name).toBe('execute_code');
    expect(config.description).toBe('Run code');
    expect(config.inputSchema).toBe(schema.shape);
    expect(config.annotations).toEqual(annotations);
  });

  it('should wrap a successful result in MCP text content', async () => {
    const server = createMockServer();
    registerTool(server, {
      name: 'count',
      description: 'count',
      inputSchema: z.object({}),
      handler: async () => ({ success: true, data: { count: 5 } }),
    });

    const result = await registeredHandler(server)({});
    expect(result.isError).toBeUndefined();
    expect(result.content).toHaveLength(1);
    expect(JSON.parse(result.content[0].text)).toEqual({ success: true, data: { count: 5 } });
  });

  it('should apply schema defaults before calling the handler', async () => {
    const server = createMockServer();
    const received = vi.fn();
    registerTool(server, {
      name: 'exec',
      description: 'exec',
      inputSchema: z.object({ language: z.enum(['python', 'node']).default('python') }),
      handler: async (input) => {
        received(input);
        return { success: true };
      },
    });

    await registeredHandler(server)({});
    expect(received).toHaveBeenCalledWith({ language: 'python' });
  });

  it('should flag thrown errors and keep BaseError codes', async () => {
    const server = createMockServer();
    registerTool(server, {
      name: 'validate',
      description: 'validates',
      inputSchema: z.object({}),
      handler: async () => {
        throw new ValidationError('bad name', { field: 'name' });
      },
    });

    const result = await registeredHandler(server)({});
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content[0].text)).toEqual({
      success: false,
      error: 'bad name',
      errorCode: 'VALIDATION_ERROR',
      errorDetails: { field: 'name' },
    });
  });

  it('should report plain Error messages', async () => {
    const server = createMockServer();
    registerTool(server, {
      name: 'fail',
      description: 'fails',
      inputSchema: z.object({}),
      handler: async () => {
        throw new Error('Something went wrong');
      },
    });

    const parsed = JSON.parse((await registeredHandler(server)({})).content[0].text);
    expect(parsed.success).toBe(false);
    expect(parsed.error).toBe('Something went wrong');
    expect(parsed.errorCode).toBe('INTERNAL_ERROR');
  });
});
