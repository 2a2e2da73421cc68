/**
 * MCP tool definitions and their transport-free handler
 */

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { QueryGatewayService } from '../services/query-gateway.service';
import { QueryResponse } from '../interfaces';

export const TOOLS: Tool[] = [
  {
    name: 'nifi_query',
    description: `Run a natural-language operation against Apache NiFi.
Examples: "list all process groups", "create a process group called 'ETL Pipeline'",
"search for kafka processors", "stop the 'Ingest' process group".`,
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'What to do, in plain language',
        },
        session_id: {
          type: 'string',
          description: 'Optional session id; the last queries of a session are kept',
        },
        context: {
          type: 'object',
          description: 'Optional extra parameters passed through to the operation',
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'nifi_intents',
    description: 'List the supported operations with example queries.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'nifi_health',
    description: 'Check gateway status and NiFi connectivity.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'nifi_session',
    description: 'Show the recent queries of a session.',
    inputSchema: {
      type: 'object',
      properties: {
        session_id: {
          type: 'string',
          description: 'Session to show',
        },
      },
      required: ['session_id'],
    },
  },
];

function text(body: string, isError = false): CallToolResult {
  return isError ? { content: [{ type: 'text', text: body }], isError } : { content: [{ type: 'text', text: body }] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatQueryResponse(response: QueryResponse): string {
  const lines = [response.message];

  if (response.intent) {
    const confidence = Math.round((response.confidence ?? 0) * 100);
    lines.push('', `Intent: ${response.intent} (confidence ${confidence}%)`);
  }
  if (response.data) {
    lines.push('', JSON.stringify(response.data, null, 2));
  }

  return lines.join('\n');
}

export async function handleToolCall(
  gateway: QueryGatewayService,
  name: string,
  args: Record<string, unknown> = {},
): Promise<CallToolResult> {
  try {
    switch (name) {
      case 'nifi_query': {
        const query = args.query;
        if (typeof query !== 'string' || query.trim() === '') {
          return text('Missing required argument: query', true);
        }
        const sessionId = args.session_id;
        const context = args.context;

        const response = await gateway.processQuery({
          query,
          session_id: typeof sessionId === 'string' ? sessionId : undefined,
          context: isRecord(context) ? context : undefined,
        });
        return text(formatQueryResponse(response), !response.success);
      }

      case 'nifi_intents': {
        if (!gateway.isReady()) {
          return text('Server not initialized', true);
        }
        return text(JSON.stringify(gateway.getIntents(), null, 2));
      }

      case 'nifi_health': {
        return text(JSON.stringify(await gateway.getHealth(), null, 2));
      }

      case 'nifi_session': {
        const sessionId = args.session_id;
        if (typeof sessionId !== 'string' || sessionId === '') {
          return text('Missing required argument: session_id', true);
        }
        const session = gateway.getSession(sessionId);
        if (!session) {
          return text(`Session "${sessionId}" not found`, true);
        }
        return text(JSON.stringify(session, null, 2));
      }

      default:
        return text(`Unknown tool: ${name}`, true);
    }
  } catch (error) {
    return text(`Gateway error: ${error instanceof Error ? error.message : 'Unknown error'}`, true);
  }
}
