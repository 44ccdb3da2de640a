import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { z } from 'zod';

import { ToolInvocationError } from '../utils/errors.js';
import { logger } from '../ui/logger.js';
import { IssueSchema, toIssueRecord } from './gitlab-client.js';
import type { ToolArgs, ToolInvoker } from './tool-invoker.js';
import type { IssueRecord } from './types.js';

/** The slice of an MCP client the invoker needs. */
export interface McpToolClient {
  callTool(name: string, args: ToolArgs, timeoutMs: number): Promise<unknown>;
  close(): Promise<void>;
}

const CallToolResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .default([]),
  structuredContent: z.unknown().optional(),
  isError: z.boolean().optional(),
});

const IssuePayloadSchema = z.union([
  z.array(IssueSchema),
  z.object({ issues: z.array(IssueSchema) }).passthrough(),
]);

function parseText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extracts issue records from an MCP `tools/call` result. The payload is the
 * structured content when present, otherwise the first JSON text block.
 */
export function parseToolIssues(toolName: string, result: unknown): IssueRecord[] {
  const parsed = CallToolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new ToolInvocationError(toolName, `malformed tool result: ${parsed.error.message}`);
  }

  const texts = parsed.data.content
    .filter((block) => block.type === 'text' && block.text !== undefined)
    .map((block) => block.text ?? '');

  if (parsed.data.isError) {
    throw new ToolInvocationError(toolName, texts.join('\n') || 'tool reported an error');
  }

  let payload = parsed.data.structuredContent;
  if (payload === undefined) {
    payload = texts.map(parseText).find((value) => value !== undefined);
  }
  if (payload === undefined) {
    throw new ToolInvocationError(toolName, 'tool result contained no JSON payload');
  }

  const issues = IssuePayloadSchema.safeParse(payload);
  if (!issues.success) {
    throw new ToolInvocationError(toolName, `unexpected issue payload: ${issues.error.message}`);
  }

  const list = Array.isArray(issues.data) ? issues.data : issues.data.issues;
  return list.map(toIssueRecord);
}

export interface McpToolInvokerOptions {
  timeoutMs: number;
}

export class McpToolInvoker implements ToolInvoker {
  constructor(
    private readonly client: McpToolClient,
    private readonly options: McpToolInvokerOptions,
  ) {}

  async invoke(toolName: string, args: ToolArgs): Promise<IssueRecord[]> {
    let result: unknown;
    try {
      result = await this.client.callTool(toolName, args, this.options.timeoutMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ToolInvocationError(toolName, message, { cause: error });
    }
    return parseToolIssues(toolName, result);
  }

  close(): Promise<void> {
    return this.client.close();
  }
}

export interface McpConnectionOptions {
  url: string;
  token?: string;
  timeoutMs: number;
  /** Identifies this program to the server during the handshake. */
  clientName: string;
  clientVersion: string;
}

function createTransport(url: URL, headers: Record<string, string>): Transport {
  // Legacy servers expose an /sse endpoint; everything else speaks streamable HTTP.
  if (url.pathname.endsWith('/sse')) {
    return new SSEClientTransport(url, { requestInit: { headers } });
  }
  return new StreamableHTTPClientTransport(url, { requestInit: { headers } });
}

export async function connectMcpToolInvoker(
  options: McpConnectionOptions,
): Promise<McpToolInvoker> {
  const headers: Record<string, string> = {};
  if (options.token) {
    headers['Authorization'] = `Bearer ${options.token}`;
  }

  const client = new Client(
    { name: options.clientName, version: options.clientVersion },
    { capabilities: {} },
  );
  const transport = createTransport(new URL(options.url), headers);

  logger.debug(`Connecting to MCP server at ${options.url}`);
  await client.connect(transport, { timeout: options.timeoutMs });

  return new McpToolInvoker(
    {
      callTool: (name, args, timeoutMs) =>
        client.callTool({ name, arguments: args }, undefined, { timeout: timeoutMs }),
      close: () => client.close(),
    },
    { timeoutMs: options.timeoutMs },
  );
}
