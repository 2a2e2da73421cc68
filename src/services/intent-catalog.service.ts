import { Injectable } from '@nestjs/common';
import catalogSeed from '../seed/intent-catalog.json';
import { IntentDefinition, NifiIntent, isNifiIntent } from '../interfaces';

/**
 * Compiled catalog entry: the definition plus its patterns as RegExp
 */
export interface CompiledIntent {
  definition: IntentDefinition;
  patterns: RegExp[];
}

function loadDefinitions(): IntentDefinition[] {
  return catalogSeed.intents.map((entry) => {
    if (!isNifiIntent(entry.intent)) {
      throw new Error(`Intent catalog lists unsupported intent: ${entry.intent}`);
    }
    return {
      intent: entry.intent,
      description: entry.description,
      patterns: [...entry.patterns],
      examples: [...entry.examples],
    };
  });
}

/**
 * IntentCatalogService - static reference data for every supported operation
 *
 * Catalog order matters: the pattern matcher walks it front to back and
 * keeps the earliest intent on ties.
 */
@Injectable()
export class IntentCatalogService {
  private readonly definitions: IntentDefinition[];
  private readonly compiled: CompiledIntent[];

  constructor() {
    this.definitions = loadDefinitions();
    this.compiled = this.definitions.map((definition) => ({
      definition,
      // global so String#match counts every non-overlapping hit
      patterns: definition.patterns.map((source) => new RegExp(source, 'g')),
    }));
  }

  getDefinitions(): readonly IntentDefinition[] {
    return this.definitions;
  }

  getCompiledIntents(): readonly CompiledIntent[] {
    return this.compiled;
  }

  getDefinition(intent: NifiIntent): IntentDefinition | undefined {
    return this.definitions.find((d) => d.intent === intent);
  }

  getSupportedIntents(): string[] {
    return Object.values(NifiIntent);
  }

  /**
   * Example queries keyed by intent tag; intents without examples are omitted
   */
  getIntentExamples(): Record<string, string[]> {
    const examples: Record<string, string[]> = {};
    for (const definition of this.definitions) {
      if (definition.examples.length > 0) {
        examples[definition.intent] = [...definition.examples];
      }
    }
    return examples;
  }
}
