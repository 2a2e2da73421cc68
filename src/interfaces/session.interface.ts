/**
 * Session history interfaces
 *
 * In-memory only; a record lives as long as the gateway process.
 */

import { NifiIntent } from './intent.interface';
import { OperationResult } from './operation.interface';

export interface SessionEntry {
  timestamp: Date;
  rawQuery: string;
  intent: NifiIntent;
  confidence: number;
  result: OperationResult;
}

export interface SessionRecord {
  sessionId: string;
  createdAt: Date;
  /** Oldest first, capped at the store's history limit */
  entries: readonly SessionEntry[];
}

/**
 * Wire shape of a session, as served by GET /sessions/{id} and the
 * nifi_session tool
 */
export interface SessionView {
  session_id: string;
  created_at: string;
  queries: Array<{
    timestamp: string;
    query: string;
    intent: string;
    confidence: number;
    result: OperationResult;
  }>;
}
