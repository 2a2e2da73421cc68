import { GatewayConfig } from './config/gateway.config';
import { ClassifierProvider, OperationsBackend } from './interfaces';
import { NifiApiClient } from './nifi/nifi-api.client';
import { createClassifierProvider } from './services/providers';
import { IntentCatalogService } from './services/intent-catalog.service';
import { PatternMatcherService } from './services/pattern-matcher.service';
import { ParameterExtractorService } from './services/parameter-extractor.service';
import { LlmClassifierService } from './services/llm-classifier.service';
import { IntentResolverService } from './services/intent-resolver.service';
import { OperationDispatcherService } from './services/operation-dispatcher.service';
import { SessionStoreService } from './services/session-store.service';
import { QueryGatewayService } from './services/query-gateway.service';

export interface GatewayOverrides {
  backend?: OperationsBackend;
  /** null disables the LLM tier outright */
  provider?: ClassifierProvider | null;
}

/**
 * Manual DI - wire up the services behind one gateway.
 * Shared by the HTTP server and the MCP stdio server.
 */
export function createGateway(config: GatewayConfig, overrides: GatewayOverrides = {}): QueryGatewayService {
  const catalog = new IntentCatalogService();
  const patternMatcher = new PatternMatcherService(catalog);
  const parameterExtractor = new ParameterExtractorService();

  const provider = overrides.provider !== undefined ? overrides.provider : createClassifierProvider(config.classifier);
  const llmClassifier = new LlmClassifierService(catalog, provider);

  const resolver = new IntentResolverService(llmClassifier, patternMatcher, parameterExtractor, {
    confidenceThreshold: config.classifier.confidenceThreshold,
    classifierTimeoutMs: config.classifier.timeoutMs,
  });

  const backend = overrides.backend ?? new NifiApiClient(config.nifi);
  const dispatcher = new OperationDispatcherService(backend, catalog);
  const sessions = new SessionStoreService(config.sessionHistoryLimit);

  return new QueryGatewayService(resolver, dispatcher, sessions, catalog, llmClassifier, backend);
}
