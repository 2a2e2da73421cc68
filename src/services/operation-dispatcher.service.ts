import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BackendOperationError,
  IntentParameters,
  NifiIntent,
  OPERATIONS_BACKEND,
  OperationResult,
  ProcessedIntent,
  ROOT_GROUP_ID,
} from '../interfaces';
import type { OperationsBackend } from '../interfaces';
import { IntentCatalogService } from './intent-catalog.service';

/**
 * Raised by a handler when a required parameter is missing or a named
 * component cannot be found. Never reaches the caller as an exception.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

type IntentHandler = (params: IntentParameters) => Promise<OperationResult>;

interface GroupTarget {
  id: string;
  /** What messages call the group: its name when resolved by name */
  label: string;
}

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * OperationDispatcherService - maps a resolved intent onto backend calls
 *
 * Every intent tag either has an entry in the handler table or falls to
 * the placeholder result. Whatever happens inside a handler, dispatch()
 * resolves to an OperationResult.
 */
@Injectable()
export class OperationDispatcherService {
  private readonly logger = new Logger(OperationDispatcherService.name);
  private readonly handlers: Partial<Record<NifiIntent, IntentHandler>>;

  constructor(
    @Inject(OPERATIONS_BACKEND) private readonly backend: OperationsBackend,
    private readonly catalog: IntentCatalogService,
  ) {
    this.handlers = {
      [NifiIntent.LIST_PROCESS_GROUPS]: (p) => this.listProcessGroups(p),
      [NifiIntent.CREATE_PROCESS_GROUP]: (p) => this.createProcessGroup(p),
      [NifiIntent.START_PROCESS_GROUP]: (p) => this.setProcessGroupState(p, 'RUNNING'),
      [NifiIntent.STOP_PROCESS_GROUP]: (p) => this.setProcessGroupState(p, 'STOPPED'),
      [NifiIntent.LIST_PROCESSORS]: (p) => this.listProcessors(p),
      [NifiIntent.CREATE_PROCESSOR]: (p) => this.createProcessor(p),
      [NifiIntent.START_PROCESSOR]: (p) => this.setProcessorState(p, 'RUNNING'),
      [NifiIntent.STOP_PROCESSOR]: (p) => this.setProcessorState(p, 'STOPPED'),
      [NifiIntent.LIST_CONNECTIONS]: (p) => this.listConnections(p),
      [NifiIntent.CREATE_CONNECTION]: (p) => this.createConnection(p),
      [NifiIntent.LIST_TEMPLATES]: () => this.listTemplates(),
      [NifiIntent.CREATE_TEMPLATE]: (p) => this.createTemplate(p),
      [NifiIntent.INSTANTIATE_TEMPLATE]: (p) => this.instantiateTemplate(p),
      [NifiIntent.SEARCH_COMPONENTS]: (p) => this.searchComponents(p),
      [NifiIntent.GET_STATUS]: () => this.getStatus(),
      [NifiIntent.GET_FLOW_STATUS]: () => this.getFlowStatus(),
      [NifiIntent.GET_DOCUMENTATION]: (p) => this.getDocumentation(p),
      [NifiIntent.GET_PROCESSOR_INFO]: (p) => this.getProcessorInfo(p),
      [NifiIntent.HELP]: async () => this.getHelp(),
    };
  }

  hasHandler(intent: NifiIntent): boolean {
    return this.handlers[intent] !== undefined;
  }

  async dispatch(processed: ProcessedIntent, context: Record<string, unknown> = {}): Promise<OperationResult> {
    const params: IntentParameters = {
      ...processed.parameters,
      additionalParams: { ...processed.parameters.additionalParams, ...context },
    };

    const handler = this.handlers[processed.intent];
    if (!handler) {
      return {
        success: true,
        message: `Intent '${processed.intent}' is not yet implemented`,
        data: { intent: processed.intent, parameters: params },
      };
    }

    try {
      return await handler(params);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`Rejected ${processed.intent}: ${error.message}`);
        return { success: false, message: error.message };
      }
      if (error instanceof BackendOperationError) {
        this.logger.error(`NiFi call failed for ${processed.intent}: ${error.message}`);
        return { success: false, message: `NiFi API error: ${error.message}` };
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Operation ${processed.intent} failed: ${message}`);
      return { success: false, message: `Operation failed: ${message}` };
    }
  }

  // ============================================
  // Process groups
  // ============================================

  private async listProcessGroups(params: IntentParameters): Promise<OperationResult> {
    const group = await this.resolveGroup(params);
    const processGroups = await this.backend.getProcessGroups(group.id);

    return {
      success: true,
      message:
        processGroups.length === 0
          ? `No process groups found in '${group.label}'`
          : `Found ${processGroups.length} process group(s)`,
      data: { process_groups: processGroups, count: processGroups.length },
    };
  }

  private async createProcessGroup(params: IntentParameters): Promise<OperationResult> {
    if (!params.processGroupName) {
      throw new ValidationError('Process group name is required');
    }

    const processGroup = await this.backend.createProcessGroup(
      params.processGroupId,
      params.processGroupName,
      params.position,
    );

    return {
      success: true,
      message: `Created process group '${params.processGroupName}'`,
      data: { process_group: processGroup },
    };
  }

  private async setProcessGroupState(params: IntentParameters, state: 'RUNNING' | 'STOPPED'): Promise<OperationResult> {
    const group = await this.resolveGroup(params);

    if (state === 'RUNNING') {
      await this.backend.startProcessGroup(group.id);
    } else {
      await this.backend.stopProcessGroup(group.id);
    }

    return {
      success: true,
      message: `${state === 'RUNNING' ? 'Started' : 'Stopped'} process group '${group.label}'`,
      data: { process_group_id: group.id },
    };
  }

  // ============================================
  // Processors
  // ============================================

  private async listProcessors(params: IntentParameters): Promise<OperationResult> {
    const group = await this.resolveGroup(params);
    const processors = await this.backend.getProcessors(group.id);

    return {
      success: true,
      message:
        processors.length === 0 ? `No processors found in '${group.label}'` : `Found ${processors.length} processor(s)`,
      data: { processors, count: processors.length },
    };
  }

  private async createProcessor(params: IntentParameters): Promise<OperationResult> {
    const processorType = params.processorType;
    if (!processorType) {
      throw new ValidationError('Processor type is required');
    }

    const group = await this.resolveGroup(params);
    const name = params.processorName ?? `New ${processorType.split('.').pop() ?? processorType}`;
    const processor = await this.backend.createProcessor({
      processGroupId: group.id,
      processorType,
      name,
      position: params.position,
      properties: params.properties,
    });

    return {
      success: true,
      message: `Created processor '${name}' of type '${processorType}'`,
      data: { processor },
    };
  }

  private async setProcessorState(params: IntentParameters, state: 'RUNNING' | 'STOPPED'): Promise<OperationResult> {
    const target = await this.resolveProcessor(params);

    if (state === 'RUNNING') {
      await this.backend.startProcessor(target.id);
    } else {
      await this.backend.stopProcessor(target.id);
    }

    return {
      success: true,
      message: `${state === 'RUNNING' ? 'Started' : 'Stopped'} processor '${target.label}'`,
      data: { processor_id: target.id },
    };
  }

  // ============================================
  // Connections
  // ============================================

  private async listConnections(params: IntentParameters): Promise<OperationResult> {
    const group = await this.resolveGroup(params);
    const connections = await this.backend.getConnections(group.id);

    return {
      success: true,
      message:
        connections.length === 0
          ? `No connections found in '${group.label}'`
          : `Found ${connections.length} connection(s)`,
      data: { connections, count: connections.length },
    };
  }

  private async createConnection(params: IntentParameters): Promise<OperationResult> {
    const { sourceId, destinationId } = params;
    if (!sourceId || !destinationId) {
      throw new ValidationError('Source and destination IDs are required');
    }

    const group = await this.resolveGroup(params);
    const connection = await this.backend.createConnection({
      processGroupId: group.id,
      sourceId,
      destinationId,
      relationships: params.relationships.length > 0 ? params.relationships : ['success'],
      name: params.connectionName,
    });

    return {
      success: true,
      message: `Created connection from '${sourceId}' to '${destinationId}'`,
      data: { connection },
    };
  }

  // ============================================
  // Templates
  // ============================================

  private async listTemplates(): Promise<OperationResult> {
    const templates = await this.backend.getTemplates();

    return {
      success: true,
      message: templates.length === 0 ? 'No templates found' : `Found ${templates.length} template(s)`,
      data: { templates, count: templates.length },
    };
  }

  private async createTemplate(params: IntentParameters): Promise<OperationResult> {
    if (!params.templateName) {
      throw new ValidationError('Template name is required');
    }

    const group = await this.resolveGroup(params);
    const description = params.additionalParams.description;
    const template = await this.backend.createTemplate(
      group.id,
      params.templateName,
      typeof description === 'string' ? description : '',
    );

    return {
      success: true,
      message: `Created template '${params.templateName}'`,
      data: { template },
    };
  }

  private async instantiateTemplate(params: IntentParameters): Promise<OperationResult> {
    const templateName = params.templateName;
    if (!templateName) {
      throw new ValidationError('Template name is required');
    }

    const templates = await this.backend.getTemplates();
    const template = templates.find((t) => sameName(t.name, templateName));
    if (!template) {
      throw new ValidationError(`Template '${templateName}' not found`);
    }

    const group = await this.resolveGroup(params);
    const flow = await this.backend.instantiateTemplate(group.id, template.id, params.position);

    return {
      success: true,
      message: `Instantiated template '${template.name}' in '${group.label}'`,
      data: { template_id: template.id, flow },
    };
  }

  // ============================================
  // Search, status and documentation
  // ============================================

  private async searchComponents(params: IntentParameters): Promise<OperationResult> {
    if (!params.searchQuery) {
      throw new ValidationError('Search query is required');
    }

    const results = await this.backend.searchComponents(params.searchQuery);
    const total = Object.values(results).reduce((sum, hits) => sum + hits.length, 0);

    return {
      success: true,
      message: `Found ${total} component(s) matching '${params.searchQuery}'`,
      data: { search_results: results, total_count: total },
    };
  }

  private async getStatus(): Promise<OperationResult> {
    const diagnostics = await this.backend.getSystemDiagnostics();
    const controllerStatus = await this.backend.getControllerStatus();

    return {
      success: true,
      message: 'Retrieved NiFi system status',
      data: { system_diagnostics: diagnostics, controller_status: controllerStatus },
    };
  }

  private async getFlowStatus(): Promise<OperationResult> {
    const status = await this.backend.getControllerStatus();

    return {
      success: true,
      message: 'Retrieved flow status',
      data: { flow_status: status },
    };
  }

  private async getDocumentation(params: IntentParameters): Promise<OperationResult> {
    if (!params.processorType) {
      return this.getHelp();
    }

    const documentation = await this.backend.getProcessorDocumentation(params.processorType);
    return {
      success: true,
      message: `Retrieved documentation for ${params.processorType}`,
      data: { documentation },
    };
  }

  private async getProcessorInfo(params: IntentParameters): Promise<OperationResult> {
    if (params.processorType) {
      const info = await this.backend.getProcessorDocumentation(params.processorType);
      return {
        success: true,
        message: `Retrieved information for ${params.processorType}`,
        data: { processor_info: info },
      };
    }

    const processorTypes = await this.backend.getProcessorTypes();
    return {
      success: true,
      message: `Found ${processorTypes.length} processor types`,
      data: { processor_types: processorTypes },
    };
  }

  private getHelp(): OperationResult {
    return {
      success: true,
      message: 'Here are some example queries you can use:',
      data: {
        examples: this.catalog.getIntentExamples(),
        supported_intents: this.catalog.getSupportedIntents(),
      },
    };
  }

  // ============================================
  // Name resolution
  // ============================================

  /**
   * An explicit non-root id wins; otherwise a group name is looked up among
   * the children of the root group.
   */
  private async resolveGroup(params: IntentParameters): Promise<GroupTarget> {
    const name = params.processGroupName;
    if (params.processGroupId !== ROOT_GROUP_ID || !name) {
      return { id: params.processGroupId, label: params.processGroupId };
    }

    const groups = await this.backend.getProcessGroups(ROOT_GROUP_ID);
    const match = groups.find((group) => sameName(group.name, name));
    if (!match) {
      throw new ValidationError(`Process group '${name}' not found`);
    }
    return { id: match.id, label: match.name };
  }

  private async resolveProcessor(params: IntentParameters): Promise<GroupTarget> {
    if (params.processorId) {
      return { id: params.processorId, label: params.processorName ?? params.processorId };
    }

    const name = params.processorName;
    if (!name) {
      throw new ValidationError('Processor name or id is required');
    }

    const group = await this.resolveGroup(params);
    const processors = await this.backend.getProcessors(group.id);
    const match = processors.find((processor) => sameName(processor.name, name));
    if (!match) {
      throw new ValidationError(`Processor '${name}' not found in '${group.label}'`);
    }
    return { id: match.id, label: match.name };
  }
}
