import fs from 'fs';

/**
 * Where `print` writes and `input` reads. The interpreter never touches the
 * process streams directly.
 */
export interface Terminal {
  write(text: string): void;

  /** One line without its terminator, or null once input is exhausted. */
  readLine(): string | null;
}

export class ProcessTerminal implements Terminal {

  constructor(private fd = 0) {
  }

  write(text: string): void {
    process.stdout.write(text);
  }

  // Blocks until a full line has arrived. Bytes are read one at a time so
  // nothing past the line feed is consumed.
  readLine(): string | null {
    const bytes: number[] = [];
    const buffer = Buffer.alloc(1);

    while (true) {
      let read: number;

      try {
        read = fs.readSync(this.fd, buffer, 0, 1, null);
      } catch (e) {
        if (isErrno(e) && e.code === 'EAGAIN') {
          // non-blocking descriptor with nothing to read yet
          sleep(retryDelay);
          continue;
        } else if (isErrno(e) && e.code === 'EOF') {
          read = 0;
        } else {
          throw e;
        }
      }

      if (read === 0) {
        return bytes.length === 0 ? null : decodeLine(bytes);
      } else if (buffer[0] === 0x0a) {
        return decodeLine(bytes);
      } else {
        bytes.push(buffer[0]);
      }
    }
  }
}

const retryDelay = 10;

function sleep(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function decodeLine(bytes: number[]): string {
  return Buffer.from(bytes).toString('utf8').replace(/\r$/, '');
}

function isErrno(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Keeps output in memory and answers `input` from a fixed list of lines.
 */
export class BufferTerminal implements Terminal {

  output = '';

  private readonly lines: string[];

  constructor(lines: Iterable<string> = []) {
    this.lines = Array.from(lines);
  }

  write(text: string): void {
    this.output += text;
  }

  readLine(): string | null {
    return this.lines.shift() ?? null;
  }

  feed(...lines: string[]): void {
    this.lines.push(...lines);
  }
}
