// NiFi natural-language gateway
// Free-text queries in, Apache NiFi operations out

// Interfaces
export * from './interfaces';

// Configuration
export { loadGatewayConfig, validateGatewayConfig } from './config/gateway.config';
export type { GatewayConfig, NifiConnectionConfig, ClassifierConfig, LlmProviderType } from './config/gateway.config';

// Services
export { IntentCatalogService } from './services/intent-catalog.service';
export type { CompiledIntent } from './services/intent-catalog.service';
export { PatternMatcherService, PATTERN_MATCH_WEIGHT, PATTERN_CONFIDENCE_CAP } from './services/pattern-matcher.service';
export type { PatternMatch } from './services/pattern-matcher.service';
export { ParameterExtractorService } from './services/parameter-extractor.service';
export { LlmClassifierService } from './services/llm-classifier.service';
export { IntentResolverService, INTENT_RESOLVER_OPTIONS } from './services/intent-resolver.service';
export type { IntentResolverOptions } from './services/intent-resolver.service';
export { OperationDispatcherService, ValidationError } from './services/operation-dispatcher.service';
export { SessionStoreService, KeyedMutex, SESSION_HISTORY_LIMIT, DEFAULT_SESSION_HISTORY_LIMIT } from './services/session-store.service';
export { QueryGatewayService } from './services/query-gateway.service';
export { createClassifierProvider, OpenAIClassifierProvider, AnthropicClassifierProvider } from './services/providers';

// NiFi REST client
export { NifiApiClient } from './nifi/nifi-api.client';
export type { RetryConfig } from './nifi/nifi-api.client';

// Wiring and surfaces
export { createGateway } from './gateway.factory';
export type { GatewayOverrides } from './gateway.factory';
export { createRequestHandler } from './api/request-handler';
export type { RequestHandler } from './api/request-handler';
export { TOOLS, handleToolCall, formatQueryResponse } from './mcp/tools';
