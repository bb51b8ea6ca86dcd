/**
 * Intent Classifier
 *
 * Decides what kind of query the user sent before any retrieval happens.
 *
 * 1. Lexical rules: greeting, farewell, help and identity phrases in
 *    Norwegian and English. A rule matches only when nothing but stop words
 *    is left once the phrases are removed, so "help with ETCS-12 braking" is
 *    not a help request. A lone topic keyword ("etcs") is a help request
 *    for that topic.
 * 2. Semantic precheck: when no rule matches, the reference-resolved query is
 *    embedded and compared with its single nearest chunk. Below
 *    `precheckMinRelevance` the query is out of scope.
 *
 * Rules never touch the index.
 */

import { ConversationContext, Intent } from '../../shared/types';
import {
  EmbeddingFailedError,
  IndexUnavailableError,
  RetrievalTimeoutError,
  withTimeout,
} from '../errors';
import { logger } from '../logger';
import { resolveReferencesIn } from './contextManager';
import { EmbeddingIndexer } from './embeddingIndexer';
import { consumePhrases, phrasesFor, singleKeywordTopic } from './textAnalysis';

export interface IntentClassifierConfig {
  /** Nearest-chunk similarity a query needs to count as technical */
  precheckMinRelevance: number;
  /** Budget for the precheck's embedding and search */
  precheckTimeoutMs: number;
}

export const DEFAULT_INTENT_CONFIG: IntentClassifierConfig = {
  precheckMinRelevance: 0.15,
  precheckTimeoutMs: 2000,
};

type RuleIntent = Extract<Intent, { kind: 'greeting' | 'help' }>;

interface Rule {
  phrases: string[];
  intent: RuleIntent;
}

// Highest priority first: "hi, what can you do?" is a help request
const RULES: Rule[] = [
  { phrases: phrasesFor('identity'), intent: { kind: 'help', variant: 'identity' } },
  { phrases: phrasesFor('help'), intent: { kind: 'help', variant: 'capabilities' } },
  { phrases: phrasesFor('farewells'), intent: { kind: 'greeting', variant: 'farewell' } },
  { phrases: phrasesFor('greetings'), intent: { kind: 'greeting', variant: 'hello' } },
];

const ALL_RULE_PHRASES = RULES.flatMap((rule) => rule.phrases);

/**
 * Applies the lexical rules only. A query that is a single topic keyword
 * ("etcs", "kostnad") asks what the user wants to know about the topic.
 */
export function matchRules(queryText: string): RuleIntent | undefined {
  const { consumed, remainder } = consumePhrases(queryText, ALL_RULE_PHRASES);
  if (consumed.length > 0 && remainder.length === 0) {
    const rule = RULES.find((candidate) =>
      candidate.phrases.some((phrase) => consumed.includes(phrase))
    );
    if (rule) return rule.intent;
  }

  const topic = singleKeywordTopic(queryText);
  return topic ? { kind: 'help', variant: 'topic', topic } : undefined;
}

export interface ClassifyOptions {
  signal?: AbortSignal;
}

export class IntentClassifier {
  private readonly config: IntentClassifierConfig;

  constructor(
    private readonly indexer: EmbeddingIndexer,
    config: Partial<IntentClassifierConfig> = {}
  ) {
    this.config = { ...DEFAULT_INTENT_CONFIG, ...config };
  }

  /**
   * Classifies a query in the light of the session's history.
   *
   * @throws RequestCancelledError when the signal fires during the precheck
   */
  async classify(
    queryText: string,
    context: ConversationContext,
    options: ClassifyOptions = {}
  ): Promise<Intent> {
    const ruleIntent = matchRules(queryText);
    if (ruleIntent) {
      return ruleIntent;
    }

    if (!this.indexer.ready) {
      return { kind: 'outOfScope', reason: 'unavailable' };
    }
    if (this.indexer.size === 0) {
      return { kind: 'outOfScope', reason: 'emptyIndex' };
    }

    const precheckText = resolveReferencesIn(queryText, context);
    try {
      const similarity = await withTimeout(
        async (signal) => {
          const vector = await this.indexer.embedQuery(precheckText, signal);
          return this.indexer.search(vector, 1)[0]?.similarity ?? 0;
        },
        this.config.precheckTimeoutMs,
        options.signal
      );

      if (similarity < this.config.precheckMinRelevance) {
        return { kind: 'outOfScope', reason: 'lowRelevance' };
      }
      return { kind: 'technical', precheckSimilarity: similarity };
    } catch (error) {
      if (error instanceof EmbeddingFailedError) {
        logger.debug(`Precheck embedding failed: ${error.message}`);
        return { kind: 'outOfScope', reason: 'embeddingFailed' };
      }
      if (error instanceof IndexUnavailableError) {
        return { kind: 'outOfScope', reason: 'unavailable' };
      }
      if (error instanceof RetrievalTimeoutError) {
        // Retrieval gets its own budget and reports the timeout to the user
        return { kind: 'technical', precheckSimilarity: 0 };
      }
      throw error;
    }
  }
}

export function createIntentClassifier(
  indexer: EmbeddingIndexer,
  config?: Partial<IntentClassifierConfig>
): IntentClassifier {
  return new IntentClassifier(indexer, config);
}
