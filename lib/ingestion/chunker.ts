const DEFAULT_CHUNK_CHARS = 1000;
const DEFAULT_OVERLAP_CHARS = 200;
const MIN_CHUNK_CHARS = 20;

export type ChunkOptions = {
  chunkSize?: number;
  overlap?: number;
};

function normalizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?…])\s+|\n{2,}/)
    .map((part) => normalizeText(part))
    .filter((part) => part.length > 0);
}

/** Sentences longer than a chunk are cut into overlapping windows. */
function hardSplit(sentence: string, size: number, overlap: number): string[] {
  if (sentence.length <= size) return [sentence];

  const out: string[] = [];
  const step = size - overlap;
  for (let start = 0; start < sentence.length; start += step) {
    out.push(sentence.slice(start, start + size));
    if (start + size >= sentence.length) break;
  }
  return out;
}

function joinedLength(parts: string[]): number {
  if (parts.length === 0) return 0;
  return parts.reduce((total, part) => total + part.length, parts.length - 1);
}

/** Trailing whole sentences of `parts` that fit in `overlap` chars. */
function overlapTail(parts: string[], overlap: number): string[] {
  let start = parts.length;
  while (start > 0 && joinedLength(parts.slice(start - 1)) <= overlap) {
    start -= 1;
  }
  return parts.slice(start);
}

/**
 * Sentence-aware chunking: sentences accumulate up to `chunkSize` chars and
 * each new chunk repeats the previous chunk's last sentences, up to `overlap`
 * chars.
 */
export function chunkText(text: string, options?: ChunkOptions): string[] {
  const size = Math.max(MIN_CHUNK_CHARS, Math.floor(options?.chunkSize ?? DEFAULT_CHUNK_CHARS));
  const overlap = Math.max(0, Math.min(Math.floor(options?.overlap ?? DEFAULT_OVERLAP_CHARS), Math.floor(size / 2)));

  const pieces = splitSentences(text).flatMap((sentence) => hardSplit(sentence, size, overlap));
  const chunks: string[] = [];
  let current: string[] = [];

  for (const piece of pieces) {
    if (current.length === 0 || joinedLength([...current, piece]) <= size) {
      current.push(piece);
      continue;
    }

    chunks.push(current.join(" "));
    let tail = overlapTail(current, overlap);
    if (joinedLength([...tail, piece]) > size) tail = [];
    current = [...tail, piece];
  }

  if (current.length > 0) chunks.push(current.join(" "));
  return chunks;
}

const TYPE_BY_EXTENSION: Record<string, string> = {
  pdf: "pdf",
  docx: "docx",
  doc: "doc",
  txt: "text",
  md: "text",
  html: "html",
  htm: "html",
  rtf: "rtf",
};

export function documentTypeFromName(name: string): string {
  const match = /\.([a-z0-9]+)$/i.exec(name.trim());
  if (!match) return "unknown";
  return TYPE_BY_EXTENSION[match[1].toLowerCase()] ?? match[1].toLowerCase();
}
