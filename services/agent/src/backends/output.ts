/**
 * Output helpers for backends: truncation of oversized tool output and a
 * bounded line buffer for child-process stderr.
 */

export function truncateOutput(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const dropped = text.length - maxChars;
  return `${text.slice(0, maxChars)}…[truncated ${dropped} chars]`;
}

/**
 * Keeps the last `capacity` lines written to it. Lines longer than
 * `maxLineChars` are truncated, and an unterminated line keeps only its last
 * `maxLineChars` characters.
 */
export class LineBuffer {
  private lines: string[] = [];
  private partial = '';

  constructor(
    private readonly capacity = 50,
    private readonly maxLineChars = 1_000,
  ) {}

  write(chunk: string): void {
    const parts = chunk.split('\n');
    const rest = parts.pop() ?? '';
    if (parts.length === 0) {
      this.partial = this.clipPartial(this.partial + rest);
      return;
    }
    parts[0] = this.partial + parts[0];
    this.partial = this.clipPartial(rest);

    for (const raw of parts) {
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
      if (line.trim() === '') continue;
      this.lines.push(truncateOutput(line, this.maxLineChars));
    }
    if (this.lines.length > this.capacity) {
      this.lines.splice(0, this.lines.length - this.capacity);
    }
  }

  tail(count = this.capacity): string[] {
    const all = this.partial.trim() === '' ? this.lines : [...this.lines, this.partial];
    return all.slice(-count);
  }

  clear(): void {
    this.lines = [];
    this.partial = '';
  }

  private clipPartial(text: string): string {
    return text.length > this.maxLineChars ? text.slice(-this.maxLineChars) : text;
  }
}
