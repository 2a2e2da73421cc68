import { Injectable } from '@nestjs/common';
import { IntentParameters, NifiIntent, createIntentParameters } from '../interfaces';

const GROUP_NAME_INTENTS: ReadonlySet<NifiIntent> = new Set([
  NifiIntent.CREATE_PROCESS_GROUP,
  NifiIntent.START_PROCESS_GROUP,
  NifiIntent.STOP_PROCESS_GROUP,
]);

const PROCESSOR_NAME_INTENTS: ReadonlySet<NifiIntent> = new Set([
  NifiIntent.CREATE_PROCESSOR,
  NifiIntent.START_PROCESSOR,
  NifiIntent.STOP_PROCESSOR,
]);

const TEMPLATE_NAME_INTENTS: ReadonlySet<NifiIntent> = new Set([
  NifiIntent.CREATE_TEMPLATE,
  NifiIntent.INSTANTIATE_TEMPLATE,
]);

const QUOTED_NAME = /["']([^"']+)["']/;

/**
 * Fuzzy phrase -> canonical processor class. Order matters: first hit wins.
 */
const PROCESSOR_TYPE_TABLE: ReadonlyArray<[RegExp, string]> = [
  [/getfile|get\s+file/, 'org.apache.nifi.processors.standard.GetFile'],
  [/putfile|put\s+file/, 'org.apache.nifi.processors.standard.PutFile'],
  [/gethttp|get\s+http/, 'org.apache.nifi.processors.standard.GetHTTP'],
  [/puthttp|put\s+http/, 'org.apache.nifi.processors.standard.PutHTTP'],
  [/kafka.*consume|consume.*kafka/, 'org.apache.nifi.processors.kafka.pubsub.ConsumeKafka_2_6'],
  [/kafka.*publish|publish.*kafka/, 'org.apache.nifi.processors.kafka.pubsub.PublishKafka_2_6'],
  [/jolt|transform.*json/, 'org.apache.nifi.processors.standard.JoltTransformJSON'],
  [/route.*attribute/, 'org.apache.nifi.processors.standard.RouteOnAttribute'],
];

const SEARCH_PATTERNS: readonly RegExp[] = [
  /search\s+for\s+(.+)/i,
  /find\s+(.+)/i,
  /look\s+for\s+(.+)/i,
];

const GROUP_REFERENCE_PATTERNS: readonly RegExp[] = [
  /in\s+(?:the\s+)?(.+?)\s+(?:process\s+)?group/i,
  /(?:process\s+)?group\s+(.+)/i,
];

/** Names that mean "the top-level group" rather than a specific one */
const RESERVED_GROUP_NAMES: ReadonlySet<string> = new Set(['root', 'main', 'default']);

/**
 * ParameterExtractorService - rule-based parameter extraction
 *
 * Names are read from the query with its original casing; only the
 * processor-type table works on the lower-cased text.
 */
@Injectable()
export class ParameterExtractorService {
  extract(query: string, intent: NifiIntent): IntentParameters {
    const text = query.trim();
    const lowered = text.toLowerCase();
    const params = createIntentParameters();

    const quoted = QUOTED_NAME.exec(text);
    if (quoted) {
      const name = quoted[1];
      if (GROUP_NAME_INTENTS.has(intent)) {
        params.processGroupName = name;
      } else if (PROCESSOR_NAME_INTENTS.has(intent)) {
        params.processorName = name;
      } else if (TEMPLATE_NAME_INTENTS.has(intent)) {
        params.templateName = name;
      }
    }

    const processorType = this.extractProcessorType(lowered);
    if (processorType) {
      params.processorType = processorType;
    }

    if (intent === NifiIntent.SEARCH_COMPONENTS) {
      const searchQuery = this.extractSearchQuery(text);
      if (searchQuery) {
        params.searchQuery = searchQuery;
      }
    }

    // Runs regardless of intent and after the quoted-name step; last writer wins
    const groupName = this.extractGroupReference(text);
    if (groupName) {
      params.processGroupName = groupName;
    }

    return params;
  }

  extractProcessorType(loweredQuery: string): string | undefined {
    for (const [pattern, processorType] of PROCESSOR_TYPE_TABLE) {
      if (pattern.test(loweredQuery)) {
        return processorType;
      }
    }
    return undefined;
  }

  extractSearchQuery(query: string): string | undefined {
    for (const pattern of SEARCH_PATTERNS) {
      const match = pattern.exec(query);
      if (match) {
        return match[1].trim();
      }
    }
    return undefined;
  }

  /**
   * "in the X group" / "group X". The first pattern that matches decides,
   * even when its capture turns out to be a reserved name.
   */
  extractGroupReference(query: string): string | undefined {
    for (const pattern of GROUP_REFERENCE_PATTERNS) {
      const match = pattern.exec(query);
      if (!match) continue;

      const name = match[1]
        .trim()
        .replace(/^(?:called|named)\s+/i, '')
        .replace(/^["']+|["']+$/g, '')
        .trim();

      if (name.length === 0 || RESERVED_GROUP_NAMES.has(name.toLowerCase())) {
        return undefined;
      }
      return name;
    }
    return undefined;
  }
}
