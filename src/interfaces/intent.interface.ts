/**
 * Intent interfaces
 *
 * The closed catalog of NiFi operations a free-text query can resolve to,
 * and the structured result of resolving one.
 */

export enum NifiIntent {
  // Process groups
  LIST_PROCESS_GROUPS = 'list-process-groups',
  CREATE_PROCESS_GROUP = 'create-process-group',
  DELETE_PROCESS_GROUP = 'delete-process-group',
  START_PROCESS_GROUP = 'start-process-group',
  STOP_PROCESS_GROUP = 'stop-process-group',

  // Processors
  LIST_PROCESSORS = 'list-processors',
  CREATE_PROCESSOR = 'create-processor',
  DELETE_PROCESSOR = 'delete-processor',
  START_PROCESSOR = 'start-processor',
  STOP_PROCESSOR = 'stop-processor',
  CONFIGURE_PROCESSOR = 'configure-processor',

  // Connections
  LIST_CONNECTIONS = 'list-connections',
  CREATE_CONNECTION = 'create-connection',
  DELETE_CONNECTION = 'delete-connection',

  // Templates
  LIST_TEMPLATES = 'list-templates',
  CREATE_TEMPLATE = 'create-template',
  INSTANTIATE_TEMPLATE = 'instantiate-template',

  SEARCH_COMPONENTS = 'search-components',

  // Status and monitoring
  GET_STATUS = 'get-status',
  GET_FLOW_STATUS = 'get-flow-status',
  MONITOR_FLOW = 'monitor-flow',

  // Documentation
  GET_DOCUMENTATION = 'get-documentation',
  GET_PROCESSOR_INFO = 'get-processor-info',

  HELP = 'help',
  UNKNOWN = 'unknown',
}

const INTENT_VALUES: ReadonlySet<string> = new Set(Object.values(NifiIntent));

export function isNifiIntent(value: unknown): value is NifiIntent {
  return typeof value === 'string' && INTENT_VALUES.has(value);
}

/** Well-known id NiFi uses for the top-level process group */
export const ROOT_GROUP_ID = 'root';

export interface Position {
  x: number;
  y: number;
}

/**
 * Parameters pulled out of a query. Everything is optional except the
 * target group id, which falls back to the root group.
 */
export interface IntentParameters {
  processGroupId: string;
  processGroupName?: string;
  processorName?: string;
  processorType?: string;
  processorId?: string;
  connectionName?: string;
  templateName?: string;
  searchQuery?: string;
  properties: Record<string, unknown>;
  relationships: string[];
  sourceId?: string;
  destinationId?: string;
  position?: Position;
  additionalParams: Record<string, unknown>;
}

export function createIntentParameters(overrides: Partial<IntentParameters> = {}): IntentParameters {
  return {
    processGroupId: ROOT_GROUP_ID,
    properties: {},
    relationships: [],
    additionalParams: {},
    ...overrides,
  };
}

export interface ProcessedIntent {
  intent: NifiIntent;
  parameters: IntentParameters;
  /** Always within [0, 1] */
  confidence: number;
  rawQuery: string;
  explanation: string;
}

/** Catalog entry: one supported operation */
export interface IntentDefinition {
  intent: NifiIntent;
  description: string;
  /** Regex sources, tried in order against the lower-cased query */
  patterns: string[];
  examples: string[];
}
