import { Inject, Injectable, Logger } from '@nestjs/common';
import { IntentResolverService } from './intent-resolver.service';
import { OperationDispatcherService } from './operation-dispatcher.service';
import { SessionStoreService } from './session-store.service';
import { IntentCatalogService } from './intent-catalog.service';
import { LlmClassifierService } from './llm-classifier.service';
import {
  GatewayHealth,
  IntentCatalogView,
  OPERATIONS_BACKEND,
  OperationResult,
  ProcessedIntent,
  QueryRequest,
  QueryResponse,
  SessionView,
} from '../interfaces';
import type { OperationsBackend } from '../interfaces';

/**
 * QueryGatewayService - one natural-language query in, one response out
 *
 * Owns the ready flag and the per-session history. Every path through
 * processQuery() resolves to a QueryResponse; nothing is thrown at the
 * HTTP or MCP surface.
 */
@Injectable()
export class QueryGatewayService {
  private readonly logger = new Logger(QueryGatewayService.name);
  private ready = false;

  constructor(
    private readonly resolver: IntentResolverService,
    private readonly dispatcher: OperationDispatcherService,
    private readonly sessions: SessionStoreService,
    private readonly catalog: IntentCatalogService,
    private readonly llmClassifier: LlmClassifierService,
    @Inject(OPERATIONS_BACKEND) private readonly backend: OperationsBackend,
  ) {}

  /**
   * Connect to NiFi. An unhealthy instance still leaves the gateway ready
   * (reported as degraded); a failed authentication does not.
   */
  async initialize(): Promise<void> {
    await this.backend.connect();

    if (await this.backend.healthCheck()) {
      this.logger.log('Connected to NiFi');
    } else {
      this.logger.warn('NiFi health check failed, continuing in degraded mode');
    }

    const provider = this.llmClassifier.getProviderName();
    this.logger.log(`Gateway ready (classifier: ${provider ?? 'pattern matching only'})`);
    this.ready = true;
  }

  isReady(): boolean {
    return this.ready;
  }

  async processQuery(request: QueryRequest): Promise<QueryResponse> {
    const sessionId = request.session_id;

    if (!this.ready) {
      return this.respond({ success: false, message: 'Server not initialized' }, sessionId);
    }

    const query = request.query.trim();
    if (!query) {
      return this.respond({ success: false, message: 'Query is required' }, sessionId);
    }

    let processed: ProcessedIntent;
    let result: OperationResult;
    try {
      processed = await this.resolver.resolve(query);
      this.logger.debug(`"${query}" -> ${processed.intent} (${processed.confidence})`);
      result = await this.dispatcher.dispatch(processed, request.context ?? {});
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error processing query '${query}': ${message}`);
      return this.respond({ success: false, message: `Error processing query: ${message}` }, sessionId);
    }

    if (sessionId) {
      await this.recordSession(sessionId, processed, result);
    }

    return this.respond(result, sessionId, processed);
  }

  getIntents(): IntentCatalogView {
    return {
      intents: this.catalog.getSupportedIntents(),
      examples: this.catalog.getIntentExamples(),
    };
  }

  async getHealth(): Promise<GatewayHealth> {
    const base = {
      classifier: this.llmClassifier.getProviderName(),
      activeSessions: this.sessions.size(),
    };

    if (!this.ready) {
      return { ...base, status: 'starting', nifiConnection: false, timestamp: new Date().toISOString() };
    }

    const nifiConnection = await this.backend.healthCheck();
    return {
      ...base,
      status: nifiConnection ? 'healthy' : 'degraded',
      nifiConnection,
      timestamp: new Date().toISOString(),
    };
  }

  getSession(sessionId: string): SessionView | null {
    const record = this.sessions.getRecord(sessionId);
    if (!record) return null;

    return {
      session_id: record.sessionId,
      created_at: record.createdAt.toISOString(),
      queries: record.entries.map((entry) => ({
        timestamp: entry.timestamp.toISOString(),
        query: entry.rawQuery,
        intent: entry.intent,
        confidence: entry.confidence,
        result: structuredClone(entry.result),
      })),
    };
  }

  shutdown(): void {
    if (!this.ready) return;
    this.ready = false;
    this.sessions.shutdown();
    this.logger.log('Gateway shut down');
  }

  private async recordSession(sessionId: string, processed: ProcessedIntent, result: OperationResult): Promise<void> {
    try {
      await this.sessions.append(sessionId, {
        timestamp: new Date(),
        rawQuery: processed.rawQuery,
        intent: processed.intent,
        confidence: processed.confidence,
        result,
      });
    } catch (error) {
      this.logger.warn(
        `Could not record session ${sessionId}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private respond(result: OperationResult, sessionId?: string, processed?: ProcessedIntent): QueryResponse {
    return {
      success: result.success,
      message: result.message,
      data: result.data,
      intent: processed?.intent,
      confidence: processed?.confidence,
      timestamp: new Date().toISOString(),
      session_id: sessionId,
    };
  }
}
