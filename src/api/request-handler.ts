import * as http from 'http';
import { QueryGatewayService } from '../services/query-gateway.service';
import { QueryRequest } from '../interfaces';

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>;

class BadRequestError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON body from request
 */
async function parseBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => (body += chunk));
    req.on('end', () => {
      try {
        resolve(JSON.parse(body || '{}'));
      } catch {
        reject(new BadRequestError('Invalid JSON'));
      }
    });
    req.on('error', reject);
  });
}

/**
 * Send JSON response
 */
function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data, null, 2));
}

function toQueryRequest(body: unknown): QueryRequest {
  const fields: Record<string, unknown> = isRecord(body) ? body : {};
  const query = fields.query;
  if (typeof query !== 'string' || query.trim() === '') {
    throw new BadRequestError('Missing required field: query');
  }
  const sessionId = fields.session_id;
  if (sessionId !== undefined && typeof sessionId !== 'string') {
    throw new BadRequestError('session_id must be a string');
  }
  const context = fields.context;
  if (context !== undefined && !isRecord(context)) {
    throw new BadRequestError('context must be an object');
  }

  return { query, session_id: sessionId, context };
}

/**
 * Route table for the HTTP surface:
 *   GET  /                 banner
 *   GET  /health           gateway and NiFi health
 *   POST /query            resolve and execute a query
 *   GET  /intents          supported intents with examples
 *   GET  /sessions/{id}    recent history of one session
 */
export function createRequestHandler(gateway: QueryGatewayService): RequestHandler {
  return async (req, res) => {
    const method = req.method || 'GET';
    const { pathname } = new URL(req.url || '/', 'http://localhost');

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if (pathname === '/' && method === 'GET') {
        sendJson(res, 200, { message: 'NiFi natural-language gateway is running' });
        return;
      }

      if (pathname === '/health' && method === 'GET') {
        sendJson(res, 200, await gateway.getHealth());
        return;
      }

      if (pathname === '/query' && method === 'POST') {
        const request = toQueryRequest(await parseBody(req));
        const response = await gateway.processQuery(request);
        sendJson(res, gateway.isReady() ? 200 : 503, response);
        return;
      }

      if (pathname === '/intents' && method === 'GET') {
        if (!gateway.isReady()) {
          sendJson(res, 503, { error: 'Server not initialized' });
          return;
        }
        sendJson(res, 200, gateway.getIntents());
        return;
      }

      const sessionMatch = /^\/sessions\/([^/]+)$/.exec(pathname);
      if (sessionMatch && method === 'GET') {
        const sessionId = decodeURIComponent(sessionMatch[1]);
        const session = gateway.getSession(sessionId);
        if (!session) {
          sendJson(res, 404, { error: 'Session not found', sessionId });
          return;
        }
        sendJson(res, 200, session);
        return;
      }

      sendJson(res, 404, { error: 'Not found', path: pathname });
    } catch (error) {
      if (error instanceof BadRequestError) {
        sendJson(res, 400, { error: error.message });
        return;
      }

      console.error('[Gateway] Error:', error);
      sendJson(res, 500, {
        error: 'Internal server error',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  };
}
