/**
 * NiFi Natural-Language Gateway - HTTP server
 *
 * Run: npm run build && npm start
 * Test: curl -X POST http://localhost:8000/query -H "Content-Type: application/json" -d '{"query": "list all process groups"}'
 */

import 'reflect-metadata';
import * as http from 'http';

import { loadGatewayConfig, validateGatewayConfig } from './config/gateway.config';
import { createGateway } from './gateway.factory';
import { createRequestHandler } from './api/request-handler';

const config = loadGatewayConfig();
const problems = validateGatewayConfig(config);
if (problems.length > 0) {
  for (const problem of problems) {
    console.error(`[Gateway] Config error: ${problem}`);
  }
  process.exit(1);
}

const gateway = createGateway(config);
const handleRequest = createRequestHandler(gateway);
const server = http.createServer((req, res) => {
  handleRequest(req, res).catch((err) => {
    console.error('[Gateway] Unhandled request error:', err);
  });
});

console.log('[Gateway] NIFI_API_URL:', config.nifi.baseUrl);
console.log('[Gateway] NIFI auth:', config.nifi.username ? 'SET' : 'NOT SET');
console.log('[Gateway] LLM_PROVIDER:', config.classifier.provider);

server.listen(config.port, config.host, () => {
  console.log(`
NiFi Natural-Language Gateway
Listening on: http://${config.host}:${config.port}

Endpoints:
  - GET  /                Banner
  - GET  /health          Gateway and NiFi health
  - POST /query           Run a natural-language query
  - GET  /intents         Supported intents and examples
  - GET  /sessions/{id}   Session history

Try: curl -X POST http://localhost:${config.port}/query \\
     -H "Content-Type: application/json" \\
     -d '{"query": "list all process groups", "session_id": "demo"}'
`);

  gateway.initialize().catch((err) => {
    console.error('[Gateway] NiFi initialization failed:', err instanceof Error ? err.message : err);
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  console.log(`\n[Gateway] ${signal} received, shutting down...`);
  gateway.shutdown();
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
