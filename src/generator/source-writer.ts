/**
 * Indentation-aware text builder for generated modules
 */
export class SourceWriter {
  private readonly output: string[] = [];
  private depth = 0;

  constructor(private readonly indentUnit = '  ') {}

  /** Appends one line at the current depth; an empty call adds a blank line */
  line(text = ''): this {
    this.output.push(text.length > 0 ? `${this.indentUnit.repeat(this.depth)}${text}` : '');
    return this;
  }

  /** Appends several lines at the current depth */
  lines(texts: readonly string[]): this {
    for (const text of texts) {
      this.line(text);
    }
    return this;
  }

  /** Runs `body` one level deeper */
  indent(body: () => void): this {
    this.depth++;
    try {
      body();
    } finally {
      this.depth--;
    }
    return this;
  }

  /**
   * Writes `opener`, the indented body, then `closer`
   */
  block(opener: string, body: () => void, closer = '}'): this {
    return this.line(opener).indent(body).line(closer);
  }

  toString(): string {
    return `${this.output.join('\n')}\n`;
  }
}
