import { Injectable, Logger } from '@nestjs/common';
import { IntentCatalogService } from './intent-catalog.service';
import { NifiIntent } from '../interfaces';

export interface PatternMatch {
  intent: NifiIntent;
  confidence: number;
  explanation: string;
}

/** Score contributed by each occurrence of a pattern */
export const PATTERN_MATCH_WEIGHT = 0.3;

/** Rule-based confidence never goes above this */
export const PATTERN_CONFIDENCE_CAP = 0.8;

/**
 * PatternMatcherService - deterministic intent classification
 *
 * Every catalog pattern is tested against the lower-cased query. An intent
 * scores the best of its patterns (hit count x 0.3); the best intent wins,
 * with ties going to whichever comes first in the catalog.
 */
@Injectable()
export class PatternMatcherService {
  private readonly logger = new Logger(PatternMatcherService.name);

  constructor(private readonly catalog: IntentCatalogService) {}

  match(query: string): PatternMatch {
    const text = query.toLowerCase().trim();

    let bestIntent: NifiIntent | null = null;
    let bestScore = 0;

    for (const { definition, patterns } of this.catalog.getCompiledIntents()) {
      let intentScore = 0;

      for (const pattern of patterns) {
        const hits = text.match(pattern);
        if (!hits) continue;

        const score = hits.length * PATTERN_MATCH_WEIGHT;
        if (score > intentScore) {
          intentScore = score;
        }
      }

      if (intentScore > bestScore) {
        bestScore = intentScore;
        bestIntent = definition.intent;
      }
    }

    if (bestIntent === null) {
      this.logger.debug(`No pattern matched: ${text.substring(0, 50)}`);
      return { intent: NifiIntent.UNKNOWN, confidence: 0, explanation: 'no pattern match' };
    }

    const confidence = Math.min(bestScore, PATTERN_CONFIDENCE_CAP);
    this.logger.debug(`Pattern match: ${bestIntent} (confidence: ${confidence})`);

    return {
      intent: bestIntent,
      confidence,
      explanation: `Matched pattern for ${bestIntent}`,
    };
  }
}
