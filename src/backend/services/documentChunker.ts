/**
 * Document Chunker Service
 *
 * Splits documents into overlapping chunks for embedding and retrieval.
 *
 * Chunks carry character offsets into the source text and their text is the
 * exact slice between them. The chunks of one document cover the whole text:
 * the first starts at 0, the last ends at the text length, and each chunk
 * starts no later than the previous one ends and no earlier than the overlap
 * window before that end.
 */

import { Chunk, Document } from '../../shared/types';

/**
 * Configuration for the chunking process.
 */
export interface ChunkingConfig {
  /** Target size for each chunk in characters */
  chunkSize: number;
  /** Share of chunkSize repeated at the start of the next chunk */
  overlapRatio: number;
  /** A trailing piece shorter than this is folded into the last chunk */
  minChunkSize: number;
}

/**
 * Default chunking configuration.
 *
 * 1500 chars is roughly 300-375 tokens of Norwegian or English prose.
 */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 1500,
  overlapRatio: 0.15,
  minChunkSize: 150,
};

/**
 * A chunk before document metadata is attached.
 */
export interface TextSpan {
  index: number;
  start: number;
  end: number;
  text: string;
}

export function overlapWindow(config: ChunkingConfig): number {
  return Math.floor(config.chunkSize * config.overlapRatio);
}

/**
 * Deterministic chunk id.
 */
export function chunkIdFor(documentId: string, index: number): string {
  return `${documentId}#${index}`;
}

/**
 * Splits text into overlapping spans.
 *
 * Sliding window:
 * 1. Take up to chunkSize characters from the current start
 * 2. Pull the end back to a paragraph, sentence or word boundary
 * 3. Start the next span one overlap window before that end, at a word start
 *
 * Whitespace-only text yields no spans.
 */
export function splitIntoChunks(
  text: string,
  config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): TextSpan[] {
  const { chunkSize, minChunkSize } = config;
  if (chunkSize < 1) {
    throw new Error(`chunkSize must be positive, got ${chunkSize}`);
  }

  if (text.trim().length === 0) {
    return [];
  }

  const overlap = Math.min(overlapWindow(config), chunkSize - 1);
  const spans: TextSpan[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      end = findNaturalBreak(text, start, end);
    }

    // Fold a short tail into this span
    if (text.length - end < minChunkSize) {
      end = text.length;
    }

    spans.push({ index: spans.length, start, end, text: text.slice(start, end) });

    if (end >= text.length) {
      break;
    }

    start = nextStart(text, start, end, overlap);
  }

  return spans;
}

/**
 * First word start at or after `end - overlap`, strictly after the previous
 * start and never past `end`.
 */
function nextStart(text: string, previousStart: number, end: number, overlap: number): number {
  let position = Math.max(end - overlap, previousStart + 1);
  while (position < end && !isWordStart(text, position)) {
    position++;
  }
  return position;
}

function isWordStart(text: string, position: number): boolean {
  const before = text[position - 1] ?? ' ';
  const at = text[position] ?? ' ';
  return /\s/.test(before) && !/\s/.test(at);
}

/**
 * Find a natural break point near the target position.
 *
 * Preference order:
 * 1. Paragraph break (double newline)
 * 2. Sentence end (. ! ? followed by a capitalised word)
 * 3. Word boundary (space)
 * 4. Original position (if no better option)
 */
function findNaturalBreak(text: string, start: number, targetEnd: number): number {
  const searchWindow = text.slice(start, targetEnd);

  const paragraphBreak = searchWindow.lastIndexOf('\n\n');
  if (paragraphBreak > searchWindow.length * 0.5) {
    return start + paragraphBreak + 2;
  }

  let lastSentenceEnd = -1;
  for (const match of searchWindow.matchAll(/[.!?]\s+(?=\p{Lu})/gu)) {
    lastSentenceEnd = (match.index ?? 0) + match[0].length;
  }
  if (lastSentenceEnd > searchWindow.length * 0.5) {
    return start + lastSentenceEnd;
  }

  const lastSpace = searchWindow.lastIndexOf(' ');
  if (lastSpace > searchWindow.length * 0.7) {
    return start + lastSpace + 1;
  }

  return targetEnd;
}

/**
 * Turns documents into chunks with parent metadata copied on.
 */
export class DocumentChunker {
  private readonly config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
  }

  get overlap(): number {
    return overlapWindow(this.config);
  }

  chunkDocument(document: Document): Chunk[] {
    return splitIntoChunks(document.text, this.config).map((span) => ({
      id: chunkIdFor(document.id, span.index),
      documentId: document.id,
      index: span.index,
      start: span.start,
      end: span.end,
      text: span.text,
      metadata: {
        language: document.language,
        category: document.category,
        title: document.title,
        tags: [...document.tags],
        ingestedAt: document.ingestedAt,
      },
    }));
  }
}

/**
 * Factory function to create a DocumentChunker.
 */
export function createDocumentChunker(config?: Partial<ChunkingConfig>): DocumentChunker {
  return new DocumentChunker(config);
}
