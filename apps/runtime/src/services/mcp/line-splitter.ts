/**
 * Reassembles newline-terminated lines from arbitrarily sized text chunks.
 * The trailing `\r` of a CRLF terminator is dropped.
 */
export class LineSplitter {
  private buffer = '';

  push(chunk: string): string[] {
    this.buffer += chunk;
    const lines: string[] = [];

    let newlineIndex: number;
    while ((newlineIndex = this.buffer.indexOf('\n')) !== -1) {
      let line = this.buffer.slice(0, newlineIndex);
      this.buffer = this.buffer.slice(newlineIndex + 1);
      if (line.endsWith('\r')) {
        line = line.slice(0, -1);
      }
      lines.push(line);
    }

    return lines;
  }

  /**
   * Return the unterminated remainder, if any, and reset.
   */
  flush(): string | null {
    const rest = this.buffer;
    this.buffer = '';
    return rest.length > 0 ? rest : null;
  }
}
