/**
 * Line-oriented I/O seams between the scenario drivers and the outside
 * world. The core never touches process streams directly; the CLI hands
 * in a source built from stdin and a sink writing to stdout, tests hand
 * in in-memory ones.
 */

/**
 * Produces input one line at a time.
 */
export interface LineSource {
  /** Next line without its terminator, or undefined at end of input */
  nextLine(): string | undefined;
}

/**
 * Accepts output one line at a time.
 */
export interface LineSink {
  writeLine(line: string): void;
}

/**
 * Line source over an in-memory list of lines.
 */
export class ArrayLineSource implements LineSource {
  private readonly lines: readonly string[];
  private position = 0;

  constructor(lines: readonly string[]) {
    this.lines = lines;
  }

  /**
   * Split a block of text on LF or CRLF. A trailing newline does not
   * produce an extra empty line.
   */
  static fromText(text: string): ArrayLineSource {
    const lines = text.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    return new ArrayLineSource(lines);
  }

  nextLine(): string | undefined {
    if (this.position >= this.lines.length) {
      return undefined;
    }
    const line = this.lines[this.position];
    this.position++;
    return line;
  }

  get remaining(): number {
    return this.lines.length - this.position;
  }
}

/**
 * Sink that keeps every line in memory.
 */
export class BufferedLineSink implements LineSink {
  private readonly buffer: string[] = [];

  writeLine(line: string): void {
    this.buffer.push(line);
  }

  get lines(): readonly string[] {
    return this.buffer;
  }

  toString(): string {
    return this.buffer.map((line) => `${line}\n`).join('');
  }
}

/**
 * Sink writing newline-terminated lines to a writable stream.
 */
export class StreamLineSink implements LineSink {
  constructor(private readonly stream: NodeJS.WritableStream) {}

  writeLine(line: string): void {
    this.stream.write(`${line}\n`);
  }
}
