import { PlayError } from './errors';
import type { PlayErrorCode } from './errors';

/**
 * Index-based, case-normalizing reader over PLAY text.
 * Reading at or past the end is an error; peeking past the end is not.
 */
export class Cursor {
  private position = 0;

  constructor(private readonly text: string) {}

  get index(): number {
    return this.position;
  }

  get done(): boolean {
    return this.position >= this.text.length;
  }

  /** Upper-cased character at the current index */
  current(): string {
    if (this.position >= this.text.length) {
      throw new PlayError('UNEXPECTED_END_OF_INPUT', this.position, undefined);
    }
    return this.text[this.position].toUpperCase();
  }

  /** Move to the next character and read it */
  advance(): string {
    this.position++;
    return this.current();
  }

  /** Upper-cased character after the current one, or undefined at the end */
  peekNext(): string | undefined {
    const next = this.position + 1;
    return next < this.text.length ? this.text[next].toUpperCase() : undefined;
  }

  /** Commit a character seen through `peekNext()` */
  skip(): void {
    this.position++;
  }

  /** Character at `index` exactly as written, for diagnostics */
  raw(index: number = this.position): string | undefined {
    return this.text[index];
  }

  /** Error for the character at `index`, defaulting to the current one */
  error(code: PlayErrorCode, index: number = this.position): PlayError {
    return new PlayError(code, index, this.raw(index));
  }
}

export function isDigit(ch: string | undefined): ch is string {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

export function digitValue(ch: string | undefined): number | undefined {
  return isDigit(ch) ? ch.charCodeAt(0) - 48 : undefined;
}
