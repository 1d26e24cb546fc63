// src/services/chunking.ts
// What: Paragraph- and sentence-aware text chunking with word overlap.
// How: Splits by paragraphs (blank-line delimited), then sentences, then word windows for oversized sentences.
//      Packs adjacent units into chunks of at most maxChunkSize estimated tokens; each new chunk is seeded with
//      the trailing overlapSize words of the previous one. Token counts are a character heuristic, not a tokenizer.

export interface ChunkingConfig {
  maxChunkSize: number; // estimated tokens
  overlapSize: number; // words carried into the next chunk
  minChunkSize: number; // estimated tokens
  preserveParagraphs: boolean;
}

export const DEFAULT_CHUNKING: ChunkingConfig = {
  maxChunkSize: 512,
  overlapSize: 50,
  minChunkSize: 25,
  preserveParagraphs: true,
};

const CHARS_PER_TOKEN = 4;
// Keeps \t, \n and \r; those are handled as whitespace.
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export function estimateTokenCount(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function chunkText(text: string, overrides: Partial<ChunkingConfig> = {}): string[] {
  const cfg = resolveConfig(overrides);
  const units = toUnits(text, cfg);

  const chunks: string[] = [];
  let buf = '';
  for (const unit of units) {
    if (buf.length === 0) {
      buf = unit;
      continue;
    }
    const join = `${buf} ${unit}`;
    if (estimateTokenCount(join) <= cfg.maxChunkSize || estimateTokenCount(buf) < cfg.minChunkSize) {
      buf = join;
      continue;
    }
    chunks.push(buf);
    buf = seedWithOverlap(buf, unit, cfg);
  }

  // A trailing remainder below the minimum is dropped, unless it is the whole document.
  if (buf.length > 0 && (chunks.length === 0 || estimateTokenCount(buf) >= cfg.minChunkSize)) {
    chunks.push(buf);
  }
  return chunks;
}

export function resolveConfig(overrides: Partial<ChunkingConfig>): ChunkingConfig {
  const merged = { ...DEFAULT_CHUNKING, ...overrides };
  const maxChunkSize = Math.max(1, Math.floor(merged.maxChunkSize));
  return {
    maxChunkSize,
    overlapSize: Math.max(0, Math.floor(merged.overlapSize)),
    minChunkSize: Math.min(Math.max(0, Math.floor(merged.minChunkSize)), maxChunkSize - 1),
    preserveParagraphs: merged.preserveParagraphs,
  };
}

/**
 * Breaks text into packing units no larger than maxChunkSize - minChunkSize tokens, so an undersized buffer
 * plus any unit still fits in one chunk.
 */
function toUnits(text: string, cfg: ChunkingConfig): string[] {
  const cleaned = text.replace(/\r\n?/g, '\n').replace(CONTROL_CHARS, '');
  const blocks = cfg.preserveParagraphs ? cleaned.split(/\n\s*\n/) : [cleaned];
  const unitCap = cfg.maxChunkSize - cfg.minChunkSize;

  const units: string[] = [];
  for (const block of blocks) {
    const para = block.replace(/\s+/g, ' ').trim();
    if (para.length === 0) continue;
    if (cfg.preserveParagraphs && estimateTokenCount(para) <= unitCap) {
      units.push(para);
      continue;
    }
    for (const sentence of splitBySentences(para)) {
      if (estimateTokenCount(sentence) <= unitCap) {
        units.push(sentence);
      } else {
        units.push(...splitByWords(sentence, unitCap));
      }
    }
  }
  return units;
}

function splitBySentences(paragraph: string): string[] {
  return paragraph.split(/(?<=[.!?])\s+/).filter((s) => s.length > 0);
}

function splitByWords(sentence: string, cap: number): string[] {
  const out: string[] = [];
  let buf = '';
  for (const word of sentence.split(' ')) {
    for (const piece of splitLongWord(word, cap)) {
      const join = buf ? `${buf} ${piece}` : piece;
      if (estimateTokenCount(join) <= cap) {
        buf = join;
      } else {
        if (buf) out.push(buf);
        buf = piece;
      }
    }
  }
  if (buf) out.push(buf);
  return out;
}

function splitLongWord(word: string, cap: number): string[] {
  const maxChars = cap * CHARS_PER_TOKEN;
  if (word.length <= maxChars) return [word];
  const pieces: string[] = [];
  for (let i = 0; i < word.length; i += maxChars) {
    pieces.push(word.slice(i, i + maxChars));
  }
  return pieces;
}

function seedWithOverlap(closed: string, unit: string, cfg: ChunkingConfig): string {
  if (cfg.overlapSize === 0) return unit;
  let words = closed.split(' ').slice(-cfg.overlapSize);
  while (words.length > 0 && estimateTokenCount(`${words.join(' ')} ${unit}`) > cfg.maxChunkSize) {
    words = words.slice(1);
  }
  return words.length > 0 ? `${words.join(' ')} ${unit}` : unit;
}
