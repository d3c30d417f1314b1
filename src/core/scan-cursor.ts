// src/core/scan-cursor.ts

/**
 * Position of one scan in its argument vector. Each scan creates its own;
 * a resumed scan passes `pastSeparator` to keep a `--` seen earlier in force.
 */
export class ScanCursor {
  private position: number;
  private separatorSeen: boolean;

  constructor(
    readonly argv: readonly string[],
    startIndex: number = 1,
    pastSeparator: boolean = false
  ) {
    this.position = Math.min(Math.max(startIndex, 0), argv.length);
    this.separatorSeen = pastSeparator;
  }

  get index(): number {
    return this.position;
  }

  get done(): boolean {
    return this.position >= this.argv.length;
  }

  /** True once a literal `--` was consumed; every later token is positional */
  get pastSeparator(): boolean {
    return this.separatorSeen;
  }

  current(): string {
    const token = this.argv[this.position];
    if (token === undefined) {
      throw new RangeError(`Scan cursor at ${this.position} is past the end of argv`);
    }
    return token;
  }

  /** The token after the current one, if any */
  peekNext(): string | undefined {
    return this.argv[this.position + 1];
  }

  advance(): void {
    this.position++;
  }

  /**
   * Consumes the token after the current one as an argument.
   * Leaves the cursor on the consumed token; the caller advances past it.
   */
  takeNext(): string | undefined {
    const next = this.peekNext();
    if (next !== undefined) this.position++;
    return next;
  }

  consumeSeparator(): void {
    this.separatorSeen = true;
    this.position++;
  }
}
