/**
 * Response Synthesizer
 *
 * Builds the answer for a classified query. Greetings and help requests get
 * templates, and a lone topic keyword gets a question back about what the
 * user wants to know. Technical questions get an extractive answer from the
 * top ranked chunks with citations; everything else gets an explicit decline.
 *
 * Answers are never composed from chunks that did not come back from
 * retrieval: no evidence means a "no matching information" answer with
 * confidence 0, worded for the topic of the question where one is known.
 */

import templates from '../data/templates.json';
import {
  Answer,
  ConversationContext,
  Intent,
  LanguageCode,
  RetrievalResult,
  RetrievedChunk,
  Topic,
} from '../../shared/types';
import { contentTokens, detectTopic } from './textAnalysis';

type TemplateKey = keyof typeof templates.en;

const TEMPLATES: Record<LanguageCode, Record<TemplateKey, string>> = templates;

const TOPIC_NAMES: Record<Topic, TemplateKey> = {
  signalling: 'topicSignalling',
  cost: 'topicCost',
  safety: 'topicSafety',
  schedule: 'topicSchedule',
  competence: 'topicCompetence',
  project: 'topicProject',
};

/** Topics with their own "no matching information" wording */
const NO_INFORMATION_BY_TOPIC: Partial<Record<Topic, TemplateKey>> = {
  signalling: 'noInformationSignalling',
  cost: 'noInformationCost',
  safety: 'noInformationSafety',
};

/**
 * Configuration for answer composition.
 */
export interface SynthesizerConfig {
  /** Top-ranked chunks the answer is drawn from (and cited) */
  maxSourceChunks: number;
  /** Sentences taken from each source chunk */
  sentencesPerChunk: number;
  /** Confidence at or above which the answer is stated plainly */
  highConfidence: number;
  /** Confidence at or above which the answer is stated with a hedge */
  mediumConfidence: number;
}

export const DEFAULT_SYNTHESIZER_CONFIG: SynthesizerConfig = {
  maxSourceChunks: 2,
  sentencesPerChunk: 2,
  highConfidence: 0.75,
  mediumConfidence: 0.5,
};

/**
 * What the synthesizer knows about the request besides the intent.
 */
export interface SynthesisContext {
  conversation: ConversationContext;
  /** Language of the answer */
  language: LanguageCode;
  /** Query the evidence was retrieved for */
  queryText: string;
  /** Documents currently in the knowledge base */
  documentCount: number;
}

export type ConfidenceBand = 'high' | 'medium' | 'low';

function assertNever(value: never): never {
  throw new Error(`Unhandled intent: ${JSON.stringify(value)}`);
}

export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = values[name];
    return value === undefined ? placeholder : String(value);
  });
}

/**
 * Sentences of a chunk, whitespace collapsed.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.replace(/\s+/g, ' ').trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Picks the sentences sharing the most terms with the query, in their
 * original order. Falls back to the first sentence when none share a term.
 */
export function selectSentences(text: string, queryTerms: Set<string>, limit: number): string[] {
  const sentences = splitSentences(text);
  const scored = sentences.map((sentence, position) => {
    let overlap = 0;
    for (const token of new Set(contentTokens(sentence))) {
      if (queryTerms.has(token)) overlap++;
    }
    return { sentence, position, overlap };
  });

  const relevant = scored
    .filter((item) => item.overlap > 0)
    .sort((a, b) => b.overlap - a.overlap || a.position - b.position)
    .slice(0, limit)
    .sort((a, b) => a.position - b.position)
    .map((item) => item.sentence);

  if (relevant.length > 0) {
    return relevant;
  }
  return sentences.slice(0, 1);
}

function withFinalStop(text: string): string {
  return /[.!?]$/.test(text) ? text : `${text}.`;
}

export class ResponseSynthesizer {
  private readonly config: SynthesizerConfig;

  constructor(config: Partial<SynthesizerConfig> = {}) {
    this.config = { ...DEFAULT_SYNTHESIZER_CONFIG, ...config };
  }

  confidenceBand(confidence: number): ConfidenceBand {
    if (confidence >= this.config.highConfidence) return 'high';
    if (confidence >= this.config.mediumConfidence) return 'medium';
    return 'low';
  }

  synthesize(intent: Intent, retrieval: RetrievalResult, context: SynthesisContext): Answer {
    const t = TEMPLATES[context.language];
    const values = { documents: context.documentCount };

    switch (intent.kind) {
      case 'greeting': {
        if (intent.variant === 'farewell') {
          return this.templated(t.farewell);
        }
        if (context.documentCount === 0) {
          return this.templated(t.helloEmpty);
        }
        if (context.conversation.turns.length > 0) {
          return this.templated(t.helloAgain);
        }
        return this.templated(fillTemplate(t.hello, values));
      }

      case 'help': {
        switch (intent.variant) {
          case 'identity':
            return this.templated(fillTemplate(t.identity, values));
          case 'capabilities':
            return this.templated(fillTemplate(t.capabilities, values));
          case 'topic':
            return this.templated(fillTemplate(t.topicClarify, { topic: t[TOPIC_NAMES[intent.topic]] }));
          default:
            return assertNever(intent);
        }
      }

      case 'technical':
        return this.answerFromEvidence(retrieval, context);

      case 'outOfScope': {
        switch (intent.reason) {
          case 'emptyIndex':
            return this.declined(t.emptyKnowledgeBase);
          case 'unavailable':
            return this.declined(t.unavailable);
          case 'embeddingFailed':
            return this.declined(t.embeddingFailed);
          case 'lowRelevance':
            return this.declined(t.outOfScope);
          default:
            return assertNever(intent.reason);
        }
      }

      default:
        return assertNever(intent);
    }
  }

  private answerFromEvidence(retrieval: RetrievalResult, context: SynthesisContext): Answer {
    const t = TEMPLATES[context.language];

    switch (retrieval.status) {
      case 'timeout':
        return this.declined(t.timeout);
      case 'indexUnavailable':
        return this.declined(t.unavailable);
      case 'embeddingFailed':
        return this.declined(t.embeddingFailed);
      case 'empty':
      case 'ok':
        break;
      default:
        return assertNever(retrieval.status);
    }

    const sources: RetrievedChunk[] = [...retrieval.items]
      .sort((a, b) => a.rank - b.rank)
      .slice(0, this.config.maxSourceChunks);
    const top = sources[0];
    if (!top) {
      const topic = detectTopic(context.queryText);
      const key = (topic && NO_INFORMATION_BY_TOPIC[topic]) ?? 'noInformation';
      return this.declined(fillTemplate(t[key], { documents: context.documentCount }));
    }

    const confidence = Math.min(1, Math.max(0, top.similarity));
    const band = this.confidenceBand(confidence);
    const queryTerms = new Set(contentTokens(context.queryText));

    const sentences: string[] = [];
    for (const source of sources) {
      for (const sentence of selectSentences(source.chunk.text, queryTerms, this.config.sentencesPerChunk)) {
        if (!sentences.includes(sentence)) sentences.push(sentence);
      }
    }

    let text: string;
    if (band === 'high') {
      text = `${t.introHigh}: ${withFinalStop(sentences.join(' '))}`;
      if (sentences.length > 1) text += ` ${t.moreDetail}`;
    } else if (band === 'medium') {
      text = `${t.introMedium}: ${withFinalStop(sentences.join(' '))}`;
    } else {
      text = `${t.introLow}: ${withFinalStop(sentences[0] ?? '')} ${t.rephrase}`;
    }

    // A low-confidence answer quotes the top chunk only
    const cited = band === 'low' ? [top] : sources;
    return {
      text,
      citedChunkIds: cited.map((source) => source.chunkId),
      confidence,
    };
  }

  private templated(text: string): Answer {
    return { text, citedChunkIds: [], confidence: 1 };
  }

  private declined(text: string): Answer {
    return { text, citedChunkIds: [], confidence: 0 };
  }
}

export function createResponseSynthesizer(config?: Partial<SynthesizerConfig>): ResponseSynthesizer {
  return new ResponseSynthesizer(config);
}
