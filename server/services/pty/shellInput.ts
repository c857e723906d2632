export const INPUT_CHUNK_SIZE = 64;
export const INPUT_CHUNK_DELAY_MS = 3;

const PASTE_START = "\x1b[200~";
const PASTE_END = "\x1b[201~";

// CSI, OSC (BEL or ST terminated), SS3, and two-byte escapes; a lone ESC matches on its own
const ESCAPE_SEQUENCE = /\x1b(?:\[[0-?]*[ -\/]*[@-~]|\][^\x07\x1b]*(?:\x07|\x1b\\)|O.|[@-Z\\-_])?/g;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split keystroke data into chunks of at most `maxChunk` characters. Cuts fall
 * only between an escape sequence and surrounding text, or inside plain text,
 * never inside a sequence or a surrogate pair. A single sequence longer than
 * `maxChunk` becomes a chunk of its own.
 */
export function splitInput(data: string, maxChunk: number = INPUT_CHUNK_SIZE): string[] {
  if (data.length === 0) return [];
  if (data.length <= maxChunk) return [data];

  const chunks: string[] = [];
  let current = "";

  const flush = () => {
    if (current.length > 0) {
      chunks.push(current);
      current = "";
    }
  };

  const appendText = (text: string) => {
    let i = 0;
    while (i < text.length) {
      const room = maxChunk - current.length;
      let end = Math.min(i + room, text.length);
      if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
        end--;
      }
      if (end <= i) {
        if (current.length > 0) {
          flush();
          continue;
        }
        end = Math.min(i + 2, text.length);
      }
      current += text.slice(i, end);
      i = end;
      if (current.length >= maxChunk) flush();
    }
  };

  let last = 0;
  for (const match of data.matchAll(ESCAPE_SEQUENCE)) {
    const start = match.index ?? last;
    appendText(data.slice(last, start));
    if (current.length + match[0].length > maxChunk) flush();
    current += match[0];
    last = start + match[0].length;
  }
  appendText(data.slice(last));
  flush();

  return chunks;
}

/** A complete bracketed paste goes to the shell in one write. */
export function isWholePaste(data: string): boolean {
  return (
    data.length >= PASTE_START.length + PASTE_END.length &&
    data.startsWith(PASTE_START) &&
    data.endsWith(PASTE_END)
  );
}

export interface ShellInputPumpOptions {
  write: (chunk: string) => void;
  onError: (error: unknown) => void;
  chunkSize?: number;
  delayMs?: number;
}

/**
 * Ordered keystroke delivery to one shell. The first chunk of an idle pump is
 * written synchronously; later chunks follow one per `delayMs` so a large
 * paste does not flood the line discipline.
 */
export class ShellInputPump {
  private readonly write: (chunk: string) => void;
  private readonly onError: (error: unknown) => void;
  private readonly chunkSize: number;
  private readonly delayMs: number;
  private pending: string[] = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(options: ShellInputPumpOptions) {
    this.write = options.write;
    this.onError = options.onError;
    this.chunkSize = options.chunkSize ?? INPUT_CHUNK_SIZE;
    this.delayMs = options.delayMs ?? INPUT_CHUNK_DELAY_MS;
  }

  push(data: string): void {
    if (data.length === 0) return;

    if (isWholePaste(data)) {
      this.pending.push(data);
    } else {
      this.pending.push(...splitInput(data, this.chunkSize));
    }

    if (this.timer === null) {
      this.writeNext();
    }
  }

  /** Chunks not yet handed to the shell */
  get backlog(): number {
    return this.pending.length;
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pending = [];
  }

  private writeNext(): void {
    this.timer = null;
    const chunk = this.pending.shift();
    if (chunk === undefined) return;

    try {
      this.write(chunk);
    } catch (error) {
      this.onError(error);
    }

    if (this.pending.length > 0) {
      this.timer = setTimeout(() => this.writeNext(), this.delayMs);
    }
  }
}
