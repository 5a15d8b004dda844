export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

const DEFAULT_SEPARATORS = ['\n\n', '\n', ' ', ''];

/**
 * Recursive character splitter. Tries each separator in turn, recursing into
 * pieces still longer than `chunkSize`, then greedily merges neighbours so
 * consecutive chunks share up to `chunkOverlap` characters.
 */
export class RecursiveTextChunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly separators: string[];

  constructor(options: ChunkerOptions) {
    if (options.chunkOverlap >= options.chunkSize) {
      throw new Error(`[agent] chunk overlap (${options.chunkOverlap}) must be smaller than chunk size (${options.chunkSize})`);
    }

    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  splitText(text: string): string[] {
    return this.split(text, this.separators);
  }

  private split(text: string, separators: string[]): string[] {
    let separator = separators[separators.length - 1] ?? '';
    let remaining: string[] = [];

    for (let index = 0; index < separators.length; index += 1) {
      const candidate = separators[index] ?? '';
      if (candidate === '') {
        separator = candidate;
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(index + 1);
        break;
      }
    }

    const pieces = (separator === '' ? Array.from(text) : text.split(separator)).filter((piece) => piece.length > 0);
    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of pieces) {
      if (piece.length < this.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        chunks.push(...this.merge(pending, separator));
        pending = [];
      }

      if (remaining.length === 0) {
        chunks.push(piece);
      } else {
        chunks.push(...this.split(piece, remaining));
      }
    }

    if (pending.length > 0) {
      chunks.push(...this.merge(pending, separator));
    }

    return chunks;
  }

  private merge(pieces: string[], separator: string): string[] {
    const separatorLength = separator.length;
    const merged: string[] = [];
    const window: string[] = [];
    let total = 0;

    const flush = () => {
      const joined = window.join(separator).trim();
      if (joined.length > 0) {
        merged.push(joined);
      }
    };

    for (const piece of pieces) {
      const joinCost = () => (window.length > 0 ? separatorLength : 0);

      if (total + piece.length + joinCost() > this.chunkSize && window.length > 0) {
        flush();

        while (total > this.chunkOverlap || (total > 0 && total + piece.length + joinCost() > this.chunkSize)) {
          const first = window.shift();
          if (first === undefined) {
            break;
          }
          total -= first.length + (window.length > 0 ? separatorLength : 0);
        }
      }

      total += piece.length + joinCost();
      window.push(piece);
    }

    flush();
    return merged;
  }
}
