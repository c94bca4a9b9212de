import { describe, expect, it } from "vitest";

import { quoteToken, TrustedStream, UntrustedStream } from "@/stream";

import { catchQuit } from "./helpers";

describe("TrustedStream", () => {
  it("reads integers, words and lines", () => {
    const stream = new TrustedStream("answer", "  42 hello\n-7\n\n");
    expect(stream.readInt()).toBe(42);
    expect(stream.readWord()).toBe("hello");
    expect(stream.readLong(-10n, 10n, "x")).toBe(-7n);
    expect(stream.seekEof()).toBe(true);
  });

  it("fails with internal-failure", () => {
    const quit = catchQuit(() => new TrustedStream("answer", "abc").readInt("n"));
    expect(quit.outcome).toBe("internal-failure");
    expect(quit.originalMessage).toBe('Expected integer, but "abc" found (n)');
  });

  it("rejects integers that aren't written canonically", () => {
    expect(catchQuit(() => new TrustedStream("answer", "007").readInt()).originalMessage).toBe(
      'Expected integer, but "007" found'
    );
    expect(catchQuit(() => new TrustedStream("answer", "-0").readInt()).originalMessage).toBe(
      'Expected integer, but "-0" found'
    );
    expect(catchQuit(() => new TrustedStream("answer", "+5").readInt()).originalMessage).toBe(
      'Expected integer, but "+5" found'
    );
  });

  it("rejects integers that overflow their type", () => {
    expect(catchQuit(() => new TrustedStream("answer", "2147483648").readInt()).originalMessage).toBe(
      'Expected int32, but "2147483648" found'
    );
    expect(
      catchQuit(() => new TrustedStream("answer", "9223372036854775808").readLong(1n, 2n, "a")).originalMessage
    ).toBe('Expected int64, but "9223372036854775808" found (a)');
  });

  it("reads the rest of a line", () => {
    const stream = new TrustedStream("input", "\n12\n34 56\r\nxy");
    expect(stream.readInt("n")).toBe(12);
    stream.readEoln();
    expect(stream.readString("s")).toBe("34 56");
    expect(stream.readString()).toBe("xy");
    expect(stream.seekEof()).toBe(true);
  });

  it("requires a line break where an end of line is expected", () => {
    const stream = new TrustedStream("input", "1 5\n");
    stream.readInt();
    expect(catchQuit(() => stream.readEoln()).originalMessage).toBe("Expected EOLN in input");
  });

  it("skips trailing spaces before an end of line otherwise", () => {
    const stream = new TrustedStream("answer", "1 \t\r\n5");
    stream.readInt();
    stream.readEoln();
    expect(stream.readInt()).toBe(5);
  });

  it("fails to read a string at the end of file", () => {
    expect(catchQuit(() => new TrustedStream("input", "").readString("s")).originalMessage).toBe(
      "Unexpected end of file - string expected (s)"
    );
  });
});

describe("UntrustedStream", () => {
  it("fails with presentation-error", () => {
    const quit = catchQuit(() => new UntrustedStream("output", "x").readLong(1n, 9n, "out_a"));
    expect(quit.outcome).toBe("presentation-error");
    expect(quit.originalMessage).toBe('Expected integer, but "x" found (out_a)');
  });

  it("checks the range of a long", () => {
    const quit = catchQuit(() => new UntrustedStream("output", "1000000").readLong(1n, 999999n, "out_b"));
    expect(quit.outcome).toBe("presentation-error");
    expect(quit.originalMessage).toBe(
      "Integer parameter [name=out_b] equals to 1000000, violates the range [1, 999999]"
    );
  });

  it("fails to read a word at the end of file", () => {
    expect(catchQuit(() => new UntrustedStream("output", "  \n").readWord("pa")).originalMessage).toBe(
      "Unexpected end of file - token expected (pa)"
    );
  });

  it("finds trailing data", () => {
    const stream = new UntrustedStream("output", "NO extra");
    stream.readWord();
    expect(stream.seekEof()).toBe(false);
    expect(stream.readWord()).toBe("extra");
  });
});

describe("quoteToken", () => {
  it("quotes short tokens as-is", () => {
    expect(quoteToken("maybe")).toBe('"maybe"');
  });

  it("cuts long tokens in the middle", () => {
    const token = "a".repeat(40) + "b".repeat(40);
    expect(quoteToken(token)).toBe(`"${"a".repeat(30)}...${"b".repeat(31)}"`);
  });
});
