export interface TranscriptChunk {
  /** Position in the transcript, from 0. */
  index: number;
  sentences: string[];
  text: string;
  wordCount: number;
}

export interface ChunkOptions {
  maxWords: number;
  overlapSentences: number;
}

// A sentence ends at . ! or ? followed by whitespace and a capital,
// so decimals (24.5) and abbreviations before numbers (Rs. 100) hold together.
const SENTENCE_BREAK = /(?<=[.!?]["')\]]?)\s+(?=["“'(]?[A-Z])/;

export function splitSentences(text: string): string[] {
  return text
    .split(/\r?\n+/)
    .flatMap(line => line.trim().split(SENTENCE_BREAK))
    .map(s => s.replace(/\s+/g, ' ').trim())
    .filter(Boolean);
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Sentence-preserving windows of at most `maxWords` words. Each window
 * after the first repeats the last `overlapSentences` sentences of the one
 * before. A sentence longer than the limit becomes a chunk of its own.
 */
export function chunkTranscript(text: string, options: ChunkOptions): TranscriptChunk[] {
  const chunks: TranscriptChunk[] = [];
  let current: string[] = [];
  let words = 0;

  const flush = (): void => {
    if (current.length === 0) return;
    chunks.push({ index: chunks.length, sentences: current, text: current.join(' '), wordCount: words });
  };

  for (const sentence of splitSentences(text)) {
    const sentenceWords = countWords(sentence);

    if (sentenceWords > options.maxWords) {
      flush();
      chunks.push({ index: chunks.length, sentences: [sentence], text: sentence, wordCount: sentenceWords });
      current = [];
      words = 0;
      continue;
    }

    if (words + sentenceWords > options.maxWords && current.length > 0) {
      flush();
      current = options.overlapSentences > 0 ? current.slice(-options.overlapSentences) : [];
      words = current.reduce((sum, s) => sum + countWords(s), 0);
      if (words + sentenceWords > options.maxWords) {
        current = [];
        words = 0;
      }
    }

    current = [...current, sentence];
    words += sentenceWords;
  }

  flush();
  return chunks;
}
