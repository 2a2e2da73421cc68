/**
 * Operation envelope and query boundary types
 */

/**
 * Uniform result produced by every dispatcher handler
 */
export interface OperationResult {
  success: boolean;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Inbound query, as received by the HTTP and MCP surfaces
 */
export interface QueryRequest {
  query: string;
  session_id?: string;
  context?: Record<string, unknown>;
}

export interface QueryResponse {
  success: boolean;
  message: string;
  data?: Record<string, unknown>;
  intent?: string;
  confidence?: number;
  /** ISO-8601 */
  timestamp: string;
  session_id?: string;
}

export interface IntentCatalogView {
  intents: string[];
  examples: Record<string, string[]>;
}

export type GatewayHealthStatus = 'starting' | 'healthy' | 'degraded';

export interface GatewayHealth {
  status: GatewayHealthStatus;
  nifiConnection: boolean;
  classifier: string | null;
  activeSessions: number;
  timestamp: string;
}
