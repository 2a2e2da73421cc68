#!/usr/bin/env node
/**
 * NiFi MCP Server
 *
 * Exposes the natural-language gateway as MCP tools over stdio.
 * stdout carries the protocol; everything else goes to stderr.
 *
 * Tools:
 * - nifi_query: Resolve and execute a natural-language NiFi operation
 * - nifi_intents: List supported operations with examples
 * - nifi_health: Check gateway and NiFi status
 * - nifi_session: Show recent queries of a session
 */

import 'reflect-metadata';
import { Logger, LoggerService } from '@nestjs/common';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { loadGatewayConfig } from '../config/gateway.config';
import { createGateway } from '../gateway.factory';
import { TOOLS, handleToolCall } from './tools';

/**
 * Nest's default logger writes to stdout, which belongs to the protocol here
 */
class StderrLogger implements LoggerService {
  log(message: unknown, ...optionalParams: unknown[]) {
    this.write('LOG', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]) {
    this.write('ERROR', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]) {
    this.write('WARN', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]) {
    this.write('DEBUG', message, optionalParams);
  }

  private write(level: string, message: unknown, optionalParams: unknown[]) {
    const context = optionalParams[optionalParams.length - 1];
    const prefix = typeof context === 'string' ? `[${context}] ` : '';
    process.stderr.write(`${level} ${prefix}${String(message)}\n`);
  }
}

Logger.overrideLogger(new StderrLogger());

const gateway = createGateway(loadGatewayConfig());

// Create MCP server
const server = new Server(
  {
    name: 'nifi-nl-gateway',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

// Handle list tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: TOOLS };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(gateway, name, args);
});

// Start server
async function main() {
  try {
    await gateway.initialize();
  } catch (error) {
    console.error(`NiFi initialization failed: ${error instanceof Error ? error.message : String(error)}`);
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('NiFi MCP server running');
}

async function shutdown() {
  gateway.shutdown();
  await server.close();
  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown().catch(console.error);
});

main().catch(console.error);
