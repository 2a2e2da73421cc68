/**
 * Operations backend contract (Apache NiFi)
 *
 * The dispatcher only talks to this interface; the REST client in
 * src/nifi implements it and tests substitute an in-memory double.
 */

import { Position } from './intent.interface';

export interface NifiComponent {
  id: string;
  name: string;
  type?: string;
  state?: string;
  comments?: string;
}

export interface ProcessGroup extends NifiComponent {
  flowFileCount?: number;
  flowFileSize?: number;
  runningCount?: number;
  stoppedCount?: number;
  invalidCount?: number;
  disabledCount?: number;
}

export interface Processor extends NifiComponent {
  processorType?: string;
  runStatus?: string;
  validationErrors?: string[];
  properties?: Record<string, unknown>;
  relationships?: string[];
}

export interface Connection extends NifiComponent {
  sourceId?: string;
  sourceName?: string;
  destinationId?: string;
  destinationName?: string;
  flowFileCount?: number;
  flowFileSize?: number;
}

export interface Template extends NifiComponent {
  description?: string;
  timestamp?: string;
  encodingVersion?: string;
}

export interface SearchResults {
  processors: Record<string, unknown>[];
  processGroups: Record<string, unknown>[];
  connections: Record<string, unknown>[];
  inputPorts: Record<string, unknown>[];
  outputPorts: Record<string, unknown>[];
  remoteProcessGroups: Record<string, unknown>[];
  funnels: Record<string, unknown>[];
}

export interface CreateProcessorRequest {
  processGroupId: string;
  processorType: string;
  name: string;
  position?: Position;
  properties?: Record<string, unknown>;
}

export interface CreateConnectionRequest {
  processGroupId: string;
  sourceId: string;
  destinationId: string;
  relationships: string[];
  name?: string;
}

export type RunState = 'RUNNING' | 'STOPPED';

export interface OperationsBackend {
  /** Establish the session with NiFi (authenticates when credentials are set) */
  connect(): Promise<void>;
  /** Never throws */
  healthCheck(): Promise<boolean>;

  getProcessGroups(parentGroupId: string): Promise<ProcessGroup[]>;
  createProcessGroup(parentGroupId: string, name: string, position?: Position): Promise<ProcessGroup>;
  startProcessGroup(processGroupId: string): Promise<void>;
  stopProcessGroup(processGroupId: string): Promise<void>;

  getProcessors(processGroupId: string): Promise<Processor[]>;
  createProcessor(request: CreateProcessorRequest): Promise<Processor>;
  startProcessor(processorId: string): Promise<void>;
  stopProcessor(processorId: string): Promise<void>;

  getConnections(processGroupId: string): Promise<Connection[]>;
  createConnection(request: CreateConnectionRequest): Promise<Connection>;

  getTemplates(): Promise<Template[]>;
  createTemplate(processGroupId: string, name: string, description: string): Promise<Template>;
  instantiateTemplate(processGroupId: string, templateId: string, origin?: Position): Promise<Record<string, unknown>>;

  searchComponents(query: string): Promise<SearchResults>;

  getSystemDiagnostics(): Promise<Record<string, unknown>>;
  getControllerStatus(): Promise<Record<string, unknown>>;
  getProcessorTypes(): Promise<Record<string, unknown>[]>;
  getProcessorDocumentation(processorType: string): Promise<Record<string, unknown>>;
}

/** Injection token for the backend */
export const OPERATIONS_BACKEND = Symbol('OPERATIONS_BACKEND');

/**
 * Error raised by a backend call.
 * `transient` marks transport-level failures (connection refused, timeout)
 * that a read operation may retry; HTTP error statuses are never transient.
 */
export class BackendOperationError extends Error {
  readonly statusCode?: number;
  readonly transient: boolean;

  constructor(message: string, options: { statusCode?: number; transient?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'BackendOperationError';
    this.statusCode = options.statusCode;
    this.transient = options.transient ?? false;
  }
}
