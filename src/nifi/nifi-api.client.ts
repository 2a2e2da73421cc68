/**
 * NiFi REST API client
 *
 * fetch-based implementation of the operations backend. Read calls are
 * retried on transport failures with exponential backoff; writes are sent
 * once. Any HTTP error status is terminal.
 */

import { Logger } from '@nestjs/common';
import { NifiConnectionConfig } from '../config/gateway.config';
import {
  BackendOperationError,
  Connection,
  CreateConnectionRequest,
  CreateProcessorRequest,
  OperationsBackend,
  Position,
  ProcessGroup,
  Processor,
  RunState,
  SearchResults,
  Template,
} from '../interfaces';

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
};

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';
type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

function records(value: unknown): JsonRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class NifiApiClient implements OperationsBackend {
  private readonly logger = new Logger(NifiApiClient.name);
  private readonly baseUrl: string;
  private readonly retryConfig: RetryConfig;
  private authToken: string | null = null;

  constructor(
    private readonly config: NifiConnectionConfig,
    retryConfig: Partial<RetryConfig> = {},
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, maxRetries: config.maxRetries, ...retryConfig };
  }

  isAuthenticated(): boolean {
    return this.authToken !== null;
  }

  // ============================================
  // Connection
  // ============================================

  /**
   * Obtain a bearer token when credentials are configured.
   * Without credentials NiFi is assumed to be unsecured.
   */
  async connect(): Promise<void> {
    if (!this.config.username || !this.config.password) {
      this.logger.log('No NiFi credentials configured, assuming unsecured instance');
      return;
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/access/token`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ username: this.config.username, password: this.config.password }).toString(),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new BackendOperationError(`Authentication request failed: ${describeError(error)}`, {
        transient: true,
        cause: error,
      });
    }

    if (!response.ok) {
      throw new BackendOperationError(`Authentication failed: HTTP ${response.status}`, {
        statusCode: response.status,
      });
    }

    this.authToken = (await response.text()).trim();
    this.logger.log('Authenticated with NiFi');
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.getSystemDiagnostics();
      return true;
    } catch (error) {
      this.logger.warn(`NiFi health check failed: ${describeError(error)}`);
      return false;
    }
  }

  // ============================================
  // Process groups
  // ============================================

  async getProcessGroups(parentGroupId: string): Promise<ProcessGroup[]> {
    const flow = await this.getFlow(parentGroupId);

    return records(flow.processGroups).map((entity) => {
      const component = record(entity.component);
      const snapshot = record(record(entity.status).aggregateSnapshot);
      return {
        id: str(component.id) ?? '',
        name: str(component.name) ?? '',
        comments: str(component.comments),
        flowFileCount: num(snapshot.flowFilesQueued) ?? 0,
        flowFileSize: num(snapshot.bytesQueued) ?? 0,
        runningCount: num(snapshot.runningCount) ?? 0,
        stoppedCount: num(snapshot.stoppedCount) ?? 0,
        invalidCount: num(snapshot.invalidCount) ?? 0,
        disabledCount: num(snapshot.disabledCount) ?? 0,
      };
    });
  }

  async createProcessGroup(parentGroupId: string, name: string, position?: Position): Promise<ProcessGroup> {
    const response = await this.request('POST', `/process-groups/${encodeURIComponent(parentGroupId)}/process-groups`, {
      revision: { version: 0 },
      component: { name, position: position ?? { x: 0, y: 0 } },
    });

    const component = record(response.component);
    return {
      id: str(component.id) ?? '',
      name: str(component.name) ?? name,
      comments: str(component.comments),
    };
  }

  async startProcessGroup(processGroupId: string): Promise<void> {
    await this.setProcessGroupState(processGroupId, 'RUNNING');
  }

  async stopProcessGroup(processGroupId: string): Promise<void> {
    await this.setProcessGroupState(processGroupId, 'STOPPED');
  }

  // ============================================
  // Processors
  // ============================================

  async getProcessors(processGroupId: string): Promise<Processor[]> {
    const flow = await this.getFlow(processGroupId);

    return records(flow.processors).map((entity) => {
      const component = record(entity.component);
      return {
        ...this.toProcessor(component),
        runStatus: str(record(entity.status).runStatus),
      };
    });
  }

  async createProcessor(request: CreateProcessorRequest): Promise<Processor> {
    const response = await this.request('POST', `/process-groups/${encodeURIComponent(request.processGroupId)}/processors`, {
      revision: { version: 0 },
      component: {
        type: request.processorType,
        name: request.name,
        position: request.position ?? { x: 0, y: 0 },
        config: { properties: request.properties ?? {} },
      },
    });

    return this.toProcessor(record(response.component));
  }

  async startProcessor(processorId: string): Promise<void> {
    await this.setProcessorState(processorId, 'RUNNING');
  }

  async stopProcessor(processorId: string): Promise<void> {
    await this.setProcessorState(processorId, 'STOPPED');
  }

  // ============================================
  // Connections
  // ============================================

  async getConnections(processGroupId: string): Promise<Connection[]> {
    const flow = await this.getFlow(processGroupId);

    return records(flow.connections).map((entity) => {
      const component = record(entity.component);
      const source = record(component.source);
      const destination = record(component.destination);
      const snapshot = record(record(entity.status).aggregateSnapshot);
      return {
        id: str(component.id) ?? '',
        name: str(component.name) ?? '',
        sourceId: str(source.id),
        sourceName: str(source.name),
        destinationId: str(destination.id),
        destinationName: str(destination.name),
        flowFileCount: num(snapshot.flowFilesQueued) ?? 0,
        flowFileSize: num(snapshot.bytesQueued) ?? 0,
      };
    });
  }

  async createConnection(request: CreateConnectionRequest): Promise<Connection> {
    const { processGroupId, sourceId, destinationId } = request;
    const response = await this.request('POST', `/process-groups/${encodeURIComponent(processGroupId)}/connections`, {
      revision: { version: 0 },
      component: {
        name: request.name ?? `Connection_${sourceId}_to_${destinationId}`,
        source: { id: sourceId, groupId: processGroupId },
        destination: { id: destinationId, groupId: processGroupId },
        selectedRelationships: request.relationships,
      },
    });

    const component = record(response.component);
    return {
      id: str(component.id) ?? '',
      name: str(component.name) ?? '',
      sourceId: str(record(component.source).id),
      destinationId: str(record(component.destination).id),
    };
  }

  // ============================================
  // Templates
  // ============================================

  async getTemplates(): Promise<Template[]> {
    const response = await this.request('GET', '/flow/templates');

    return records(response.templates).map((entity) => this.toTemplate(record(entity.template)));
  }

  async createTemplate(processGroupId: string, name: string, description: string): Promise<Template> {
    const response = await this.request('POST', `/process-groups/${encodeURIComponent(processGroupId)}/templates`, {
      name,
      description,
      snippetId: processGroupId,
    });

    return this.toTemplate(record(response.template));
  }

  async instantiateTemplate(processGroupId: string, templateId: string, origin?: Position): Promise<Record<string, unknown>> {
    return this.request('POST', `/process-groups/${encodeURIComponent(processGroupId)}/template-instance`, {
      templateId,
      originX: origin?.x ?? 0,
      originY: origin?.y ?? 0,
    });
  }

  // ============================================
  // Search, status and documentation
  // ============================================

  async searchComponents(query: string): Promise<SearchResults> {
    const response = await this.request('GET', `/flow/search-results?q=${encodeURIComponent(query)}`);
    const results = record(response.searchResultsDTO ?? response);

    return {
      processors: records(results.processorResults),
      processGroups: records(results.processGroupResults),
      connections: records(results.connectionResults),
      inputPorts: records(results.inputPortResults),
      outputPorts: records(results.outputPortResults),
      remoteProcessGroups: records(results.remoteProcessGroupResults),
      funnels: records(results.funnelResults),
    };
  }

  async getSystemDiagnostics(): Promise<Record<string, unknown>> {
    return this.request('GET', '/system-diagnostics');
  }

  async getControllerStatus(): Promise<Record<string, unknown>> {
    return this.request('GET', '/flow/status');
  }

  async getProcessorTypes(): Promise<Record<string, unknown>[]> {
    const response = await this.request('GET', '/flow/processor-types');
    return records(response.processorTypes);
  }

  /**
   * Extension docs when the NiFi build serves them, else the matching
   * processor-type entry, else an empty object.
   */
  async getProcessorDocumentation(processorType: string): Promise<Record<string, unknown>> {
    const types = await this.getProcessorTypes();
    const entry = types.find((type) => type.type === processorType);
    const bundle = record(entry?.bundle);
    const group = str(bundle.group);
    const artifact = str(bundle.artifact);
    const version = str(bundle.version);

    if (group && artifact && version) {
      const typeName = processorType.split('.').pop() ?? processorType;
      try {
        return await this.request(
          'GET',
          `/extension-repository/${encodeURIComponent(group)}/${encodeURIComponent(artifact)}/${encodeURIComponent(version)}/extensions/${encodeURIComponent(typeName)}/docs`,
        );
      } catch (error) {
        if (!(error instanceof BackendOperationError)) throw error;
        this.logger.debug(`No extension docs for ${processorType}: ${error.message}`);
      }
    }

    return entry ?? {};
  }

  // ============================================
  // Internals
  // ============================================

  private async getFlow(processGroupId: string): Promise<JsonRecord> {
    const response = await this.request('GET', `/flow/process-groups/${encodeURIComponent(processGroupId)}`);
    return record(record(response.processGroupFlow).flow);
  }

  private async setProcessGroupState(processGroupId: string, state: RunState): Promise<void> {
    await this.request('PUT', `/flow/process-groups/${encodeURIComponent(processGroupId)}`, {
      id: processGroupId,
      state,
    });
  }

  private async setProcessorState(processorId: string, state: RunState): Promise<void> {
    const path = `/processors/${encodeURIComponent(processorId)}`;
    const current = await this.request('GET', path);

    await this.request('PUT', `${path}/run-status`, {
      revision: record(current.revision),
      state,
    });
  }

  private toProcessor(component: JsonRecord): Processor {
    return {
      id: str(component.id) ?? '',
      name: str(component.name) ?? '',
      type: str(component.type),
      processorType: str(component.type),
      state: str(component.state),
      comments: str(component.comments),
      validationErrors: strings(component.validationErrors),
      properties: record(record(component.config).properties),
      relationships: records(component.relationships)
        .map((relationship) => str(relationship.name))
        .filter((name): name is string => name !== undefined),
    };
  }

  private toTemplate(template: JsonRecord): Template {
    return {
      id: str(template.id) ?? '',
      name: str(template.name) ?? '',
      description: str(template.description),
      timestamp: str(template.timestamp),
      encodingVersion: str(template.encodingVersion),
    };
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<JsonRecord> {
    const send = () => this.send(method, path, body);
    return method === 'GET' ? this.withRetry(send, `${method} ${path}`) : send();
  }

  private async send(method: HttpMethod, path: string, body?: unknown): Promise<JsonRecord> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.authToken) {
      headers.Authorization = `Bearer ${this.authToken}`;
    }

    // the timeout signal also covers reading the body
    let response: Response;
    let text: string;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new BackendOperationError(`${method} ${path} failed: ${describeError(error)}`, {
        transient: true,
        cause: error,
      });
    }

    if (!response.ok) {
      const detail = text ? ` - ${text}` : '';
      throw new BackendOperationError(`${method} ${path} returned ${response.status}${detail}`, {
        statusCode: response.status,
      });
    }

    if (!text) return {};

    try {
      return record(JSON.parse(text));
    } catch (error) {
      throw new BackendOperationError(`${method} ${path} returned invalid JSON: ${describeError(error)}`, {
        statusCode: response.status,
        cause: error,
      });
    }
  }

  /**
   * Execute with exponential backoff. Only transient failures are retried.
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    let delay = this.retryConfig.initialDelayMs;

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (!(error instanceof BackendOperationError) || !error.transient || attempt >= this.retryConfig.maxRetries) {
          throw error;
        }

        this.logger.warn(
          `${operationName} failed (attempt ${attempt + 1}/${this.retryConfig.maxRetries + 1}): ${error.message}. Retrying in ${delay}ms...`,
        );
        await this.sleep(delay);
        delay = Math.min(delay * this.retryConfig.backoffMultiplier, this.retryConfig.maxDelayMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
