import { CheckerQuit } from "@/error";
import type { Outcome } from "@/checkers";

const INT32_MIN = -2147483648n;
const INT32_MAX = 2147483647n;
const INT64_MIN = -9223372036854775808n;
const INT64_MAX = 9223372036854775807n;

const MAX_QUOTED_TOKEN_LENGTH = 64;

export interface TokenStream {
  readonly name: string;

  readInt(variableName?: string): number;
  readLong(min: bigint, max: bigint, variableName: string): bigint;
  readWord(variableName?: string): string;
  readEoln(): void;
  /**
   * Reads the rest of the current line, and consumes the line break after it.
   */
  readString(variableName?: string): string;
  /**
   * @returns Whether nothing but whitespace remains.
   */
  seekEof(): boolean;
}

function isBlank(char: string) {
  return char === " " || char === "\t" || char === "\r" || char === "\n";
}

/**
 * Long tokens are cut in the middle when quoted in a message.
 */
export function quoteToken(token: string) {
  if (token.length <= MAX_QUOTED_TOKEN_LENGTH) return `"${token}"`;
  return `"${token.slice(0, 30)}...${token.slice(-31)}"`;
}

function withVariableName(message: string, variableName?: string) {
  return variableName ? `${message} (${variableName})` : message;
}

abstract class InStream implements TokenStream {
  /**
   * Which outcome a malformed read of this stream ends the check with.
   */
  protected abstract readonly failureOutcome: Outcome;

  private position = 0;

  constructor(public readonly name: string, private readonly content: string) {}

  protected fail(message: string): never {
    throw new CheckerQuit(this.failureOutcome, message);
  }

  private eof() {
    return this.position >= this.content.length;
  }

  private skipBlanks() {
    while (!this.eof() && isBlank(this.content[this.position])) this.position++;
  }

  private readToken(expected: string, variableName?: string): string {
    this.skipBlanks();
    if (this.eof()) this.fail(withVariableName(`Unexpected end of file - ${expected} expected`, variableName));

    const start = this.position;
    while (!this.eof() && !isBlank(this.content[this.position])) this.position++;
    return this.content.slice(start, this.position);
  }

  private readInteger(min: bigint, max: bigint, typeName: string, variableName?: string): bigint {
    const token = this.readToken(typeName, variableName);
    if (!/^-?\d+$/.test(token))
      this.fail(withVariableName(`Expected integer, but ${quoteToken(token)} found`, variableName));

    const value = BigInt(token);
    // Rejects leading zeros, "-0" and the like
    if (value.toString() !== token)
      this.fail(withVariableName(`Expected integer, but ${quoteToken(token)} found`, variableName));
    if (value < min || value > max)
      this.fail(withVariableName(`Expected ${typeName}, but ${quoteToken(token)} found`, variableName));
    return value;
  }

  readInt(variableName?: string): number {
    return Number(this.readInteger(INT32_MIN, INT32_MAX, "int32", variableName));
  }

  readLong(min: bigint, max: bigint, variableName: string): bigint {
    const value = this.readInteger(INT64_MIN, INT64_MAX, "int64", variableName);
    if (value < min || value > max)
      this.fail(
        `Integer parameter [name=${variableName}] equals to ${value}, violates the range [${min}, ${max}]`
      );
    return value;
  }

  readWord(variableName?: string): string {
    return this.readToken("token", variableName);
  }

  readEoln() {
    while (!this.eof() && (this.content[this.position] === " " || this.content[this.position] === "\t"))
      this.position++;

    if (this.content.startsWith("\r\n", this.position)) this.position += 2;
    else if (this.content[this.position] === "\n") this.position++;
    else this.fail(`Expected EOLN in ${this.name}`);
  }

  readString(variableName?: string): string {
    if (this.eof()) this.fail(withVariableName("Unexpected end of file - string expected", variableName));

    const lineEnd = this.content.indexOf("\n", this.position);
    const end = lineEnd === -1 ? this.content.length : lineEnd;
    const line = this.content.slice(this.position, end);
    this.position = lineEnd === -1 ? end : end + 1;
    return line.endsWith("\r") ? line.slice(0, -1) : line;
  }

  seekEof() {
    this.skipBlanks();
    return this.eof();
  }
}

/**
 * A stream the judge provides, e.g. the input and answer files. A malformed read means the
 * test data is broken.
 */
export class TrustedStream extends InStream {
  protected readonly failureOutcome = "internal-failure";
}

/**
 * The contestant's output. A malformed read is the contestant's presentation error.
 */
export class UntrustedStream extends InStream {
  protected readonly failureOutcome = "presentation-error";
}
