/**
 * Incremental scanner for the host's click stream.
 *
 * The stream is an unterminated JSON array: `[` followed by one object per
 * line, separated by commas. The scanner only ever buffers the object it is
 * currently inside, and counts braces outside of string literals so
 * `{"instance":"}"}` is read as one object.
 *
 * A partial object is abandoned, and scanning resumes at the next object,
 * when it outgrows `maxObjectLength`, when a string literal runs into a raw
 * newline, or when a line inside it starts with the `,` delimiter.
 */

/** Upper bound on a single click object's text */
export const MAX_OBJECT_LENGTH = 64 * 1024;

export class ClickScanner {
  private buffer = "";
  private depth = 0;
  private inString = false;
  private escaped = false;
  private lineStart = false;
  private dropped = 0;

  constructor(private readonly maxObjectLength = MAX_OBJECT_LENGTH) {}

  /**
   * Feed decoded text; returns the text of every object it completed.
   */
  push(text: string): string[] {
    const objects: string[] = [];

    for (const char of text) {
      if (this.depth === 0) {
        // framing: `[`, delimiters and whitespace between objects
        if (char === "{") {
          this.depth = 1;
          this.buffer = char;
        }
        continue;
      }

      if (this.inString) {
        if (char === "\n") {
          this.drop();
          continue;
        }
        this.append(char);
        if (this.depth === 0) {
          continue;
        }
        if (this.escaped) {
          this.escaped = false;
        } else if (char === "\\") {
          this.escaped = true;
        } else if (char === '"') {
          this.inString = false;
        }
        continue;
      }

      if (char === "\n") {
        this.lineStart = true;
        this.append(char);
        continue;
      }
      if (this.lineStart && char === ",") {
        this.drop();
        continue;
      }
      if (char !== " " && char !== "\t" && char !== "\r") {
        this.lineStart = false;
      }

      this.append(char);
      if (this.depth === 0) {
        // dropped for length
        continue;
      }

      if (char === '"') {
        this.inString = true;
      } else if (char === "{") {
        this.depth++;
      } else if (char === "}") {
        this.depth--;
        if (this.depth === 0) {
          objects.push(this.buffer);
          this.reset();
        }
      }
    }

    return objects;
  }

  /** Number of partial objects abandoned so far */
  get droppedCount(): number {
    return this.dropped;
  }

  /** Characters held for the object in progress */
  get bufferedLength(): number {
    return this.buffer.length;
  }

  private append(char: string): void {
    this.buffer += char;
    if (this.buffer.length > this.maxObjectLength) {
      this.drop();
    }
  }

  private drop(): void {
    this.dropped++;
    this.reset();
  }

  private reset(): void {
    this.buffer = "";
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
    this.lineStart = false;
  }
}
