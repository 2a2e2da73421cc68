import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { LlmClassifierService } from './llm-classifier.service';
import { PatternMatcherService } from './pattern-matcher.service';
import { ParameterExtractorService } from './parameter-extractor.service';
import { ProcessedIntent } from '../interfaces';

export interface IntentResolverOptions {
  /** Classifier results must be strictly above this to be accepted */
  confidenceThreshold: number;
  /** A classifier call slower than this counts as a failure */
  classifierTimeoutMs: number;
}

export const INTENT_RESOLVER_OPTIONS = Symbol('INTENT_RESOLVER_OPTIONS');

const DEFAULT_OPTIONS: IntentResolverOptions = {
  confidenceThreshold: 0.7,
  classifierTimeoutMs: 15000,
};

/**
 * IntentResolverService - two-tier intent resolution
 *
 * LLM first; its answer stands only when confident enough. Anything else
 * (no provider, provider error, timeout, low confidence) yields the
 * rule-based result, never a blend of the two.
 */
@Injectable()
export class IntentResolverService {
  private readonly logger = new Logger(IntentResolverService.name);
  private readonly options: IntentResolverOptions;

  constructor(
    private readonly llmClassifier: LlmClassifierService,
    private readonly patternMatcher: PatternMatcherService,
    private readonly parameterExtractor: ParameterExtractorService,
    @Optional() @Inject(INTENT_RESOLVER_OPTIONS) options: Partial<IntentResolverOptions> | null = null,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...(options ?? {}) };
  }

  getOptions(): IntentResolverOptions {
    return { ...this.options };
  }

  async resolve(query: string): Promise<ProcessedIntent> {
    if (this.llmClassifier.isAvailable()) {
      try {
        const result = await this.classifyWithTimeout(query);
        if (result.confidence > this.options.confidenceThreshold) {
          this.logger.debug(`LLM resolved ${result.intent} (confidence: ${result.confidence})`);
          return result;
        }
        this.logger.debug(
          `LLM confidence ${result.confidence} not above ${this.options.confidenceThreshold}, using pattern matching`,
        );
      } catch (error) {
        this.logger.warn(
          `LLM classification failed: ${error instanceof Error ? error.message : String(error)}, falling back to pattern matching`,
        );
      }
    }

    return this.resolveWithPatterns(query);
  }

  /**
   * Rule-based resolution on its own: pattern matcher + parameter extractor
   */
  resolveWithPatterns(query: string): ProcessedIntent {
    const match = this.patternMatcher.match(query);
    const parameters = this.parameterExtractor.extract(query, match.intent);

    return {
      intent: match.intent,
      parameters,
      confidence: match.confidence,
      rawQuery: query,
      explanation: match.explanation,
    };
  }

  private async classifyWithTimeout(query: string): Promise<ProcessedIntent> {
    const timeoutMs = this.options.classifierTimeoutMs;
    const pending = this.llmClassifier.classify(query);
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`classifier timed out after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      return await Promise.race([pending, timeout]);
    } catch (error) {
      // the losing call may still reject after the timeout fired
      pending.catch((late) =>
        this.logger.debug(`Late classifier failure ignored: ${late instanceof Error ? late.message : String(late)}`),
      );
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
