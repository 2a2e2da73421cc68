import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { IntentCatalogService } from './intent-catalog.service';
import {
  CLASSIFIER_PROVIDER,
  ChatMessage,
  IntentParameters,
  NifiIntent,
  Position,
  ProcessedIntent,
  ROOT_GROUP_ID,
  createIntentParameters,
  isNifiIntent,
} from '../interfaces';
import type { ClassifierProvider } from '../interfaces';

export const CLASSIFIER_TEMPERATURE = 0.1;
export const CLASSIFIER_MAX_TOKENS = 1000;

const COMMON_PROCESSOR_TYPES = [
  'GetFile: org.apache.nifi.processors.standard.GetFile',
  'PutFile: org.apache.nifi.processors.standard.PutFile',
  'GetHTTP: org.apache.nifi.processors.standard.GetHTTP',
  'PutHTTP: org.apache.nifi.processors.standard.PutHTTP',
  'ConsumeKafka: org.apache.nifi.processors.kafka.pubsub.ConsumeKafka_2_6',
  'PublishKafka: org.apache.nifi.processors.kafka.pubsub.PublishKafka_2_6',
  'JoltTransformJSON: org.apache.nifi.processors.standard.JoltTransformJSON',
  'RouteOnAttribute: org.apache.nifi.processors.standard.RouteOnAttribute',
];

const RESPONSE_SCHEMA = `{
  "intent": "one of the available intents",
  "parameters": {
    "process_group_id": "root or a specific group id",
    "process_group_name": "group name if mentioned",
    "processor_name": "processor name if mentioned",
    "processor_type": "fully qualified processor class if identifiable",
    "processor_id": "processor id if mentioned",
    "connection_name": "connection name if mentioned",
    "template_name": "template name if mentioned",
    "search_query": "search terms if applicable",
    "properties": {},
    "relationships": [],
    "source_id": "source component id if mentioned",
    "destination_id": "destination component id if mentioned",
    "position": {"x": 0, "y": 0},
    "additional_params": {}
  },
  "confidence": 0.0,
  "explanation": "one sentence on why this intent was chosen"
}`;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function readPosition(value: unknown): Position | undefined {
  if (!isJsonObject(value)) return undefined;
  const { x, y } = value;
  return typeof x === 'number' && typeof y === 'number' ? { x, y } : undefined;
}

/** Strips a ```json fence some models wrap around their answer */
function unwrapFence(text: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(text.trim());
  return fenced ? fenced[1] : text.trim();
}

/**
 * LlmClassifierService - schema-constrained intent classification via an LLM
 *
 * Provider errors propagate to the caller (the resolver decides what a
 * failure means). Anything wrong with the response itself becomes an
 * `unknown` intent with zero confidence.
 */
@Injectable()
export class LlmClassifierService {
  private readonly logger = new Logger(LlmClassifierService.name);
  private readonly systemPrompt: string;

  constructor(
    private readonly catalog: IntentCatalogService,
    @Optional() @Inject(CLASSIFIER_PROVIDER) private readonly provider: ClassifierProvider | null = null,
  ) {
    this.systemPrompt = this.buildSystemPrompt();
  }

  isConfigured(): boolean {
    return this.provider !== null;
  }

  isAvailable(): boolean {
    return this.provider !== null && this.provider.isAvailable();
  }

  getProviderName(): string | null {
    return this.provider?.name ?? null;
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  buildMessages(query: string): ChatMessage[] {
    return [
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: query },
    ];
  }

  async classify(query: string): Promise<ProcessedIntent> {
    if (!this.provider) {
      throw new Error('No classifier provider configured');
    }

    const response = await this.provider.generate(
      this.buildMessages(query),
      CLASSIFIER_TEMPERATURE,
      CLASSIFIER_MAX_TOKENS,
    );

    return this.parseResponse(response, query);
  }

  parseResponse(response: string, rawQuery: string): ProcessedIntent {
    let data: unknown;
    try {
      data = JSON.parse(unwrapFence(response));
    } catch (error) {
      return this.failure(rawQuery, `invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!isJsonObject(data)) {
      return this.failure(rawQuery, 'response is not a JSON object');
    }

    const { intent, parameters, confidence, explanation } = data;

    if (intent === undefined) {
      return this.failure(rawQuery, 'missing field "intent"');
    }
    if (!isNifiIntent(intent)) {
      return this.failure(rawQuery, `unknown intent value ${JSON.stringify(intent)}`);
    }
    if (confidence === undefined) {
      return this.failure(rawQuery, 'missing field "confidence"');
    }
    if (typeof confidence !== 'number' || !Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      return this.failure(rawQuery, `confidence out of range: ${JSON.stringify(confidence)}`);
    }
    if (parameters !== undefined && !isJsonObject(parameters)) {
      return this.failure(rawQuery, 'field "parameters" is not an object');
    }

    const rawParameters: JsonObject = isJsonObject(parameters) ? parameters : {};

    return {
      intent,
      parameters: this.readParameters(rawParameters),
      confidence,
      rawQuery,
      explanation: typeof explanation === 'string' ? explanation : `Classified as ${intent}`,
    };
  }

  private readParameters(raw: JsonObject): IntentParameters {
    const relationships = Array.isArray(raw.relationships)
      ? raw.relationships.filter((r): r is string => typeof r === 'string')
      : [];

    return createIntentParameters({
      processGroupId: optionalString(raw.process_group_id) ?? ROOT_GROUP_ID,
      processGroupName: optionalString(raw.process_group_name),
      processorName: optionalString(raw.processor_name),
      processorType: optionalString(raw.processor_type),
      processorId: optionalString(raw.processor_id),
      connectionName: optionalString(raw.connection_name),
      templateName: optionalString(raw.template_name),
      searchQuery: optionalString(raw.search_query),
      properties: isJsonObject(raw.properties) ? raw.properties : {},
      relationships,
      sourceId: optionalString(raw.source_id),
      destinationId: optionalString(raw.destination_id),
      position: readPosition(raw.position),
      additionalParams: isJsonObject(raw.additional_params) ? raw.additional_params : {},
    });
  }

  private failure(rawQuery: string, reason: string): ProcessedIntent {
    this.logger.warn(`Failed to parse classifier response: ${reason}`);
    return {
      intent: NifiIntent.UNKNOWN,
      parameters: createIntentParameters(),
      confidence: 0,
      rawQuery,
      explanation: `Failed to parse classifier response: ${reason}`,
    };
  }

  private buildSystemPrompt(): string {
    const intentList = this.catalog
      .getDefinitions()
      .map((d) => `- ${d.intent}: ${d.description}`)
      .join('\n');

    return `You are an Apache NiFi operations assistant. You turn an operator's request into one structured NiFi operation.

Available intents:
${intentList}

Reply with a single JSON object and nothing else, using exactly this structure:
${RESPONSE_SCHEMA}

"confidence" is a number between 0 and 1. Use "unknown" when no intent fits.

Common NiFi processor types:
${COMMON_PROCESSOR_TYPES.map((t) => `- ${t}`).join('\n')}

Extract every parameter the request states; leave the rest out.`;
  }
}
