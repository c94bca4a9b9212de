import winston from "winston";

import { CheckerQuit } from "@/error";
import { stringToOmitted } from "@/omittableString";
import type { OmittableString } from "@/omittableString";
import type { TrustedStream, UntrustedStream } from "@/stream";

// accepted:           the output is correct
// wrong-answer:       the output is well-formed but doesn't match the answer
// presentation-error: the output couldn't be read
// internal-failure:   the input or answer file is inconsistent, never the contestant's fault
export type Outcome = "accepted" | "wrong-answer" | "presentation-error" | "internal-failure";

export interface CheckerResult {
  outcome: Outcome;
  checkerMessage: OmittableString;
}

export interface CheckerStreams {
  input: TrustedStream;
  output: UntrustedStream;
  answer: TrustedStream;
}

/**
 * A check procedure returns the message for an accepted output, and calls `quit` (or lets a
 * stream read fail) for anything else.
 */
export type Check<Options> = (streams: CheckerStreams, options: Options) => string;

export interface CheckerRunOptions {
  messageLengthLimit: number;
}

export function quit(outcome: Outcome, message: string): never {
  throw new CheckerQuit(outcome, message);
}

/**
 * A failed assertion means the jury's data is broken.
 */
export function ensure(condition: boolean, message: string): asserts condition {
  if (!condition) quit("internal-failure", message);
}

export function runChecker<Options>(
  check: Check<Options>,
  streams: CheckerStreams,
  options: Options & CheckerRunOptions
): CheckerResult {
  let outcome: Outcome;
  let message: string;
  try {
    message = check(streams, options);
    if (!streams.output.seekEof()) quit("presentation-error", "Extra information in the output file");
    outcome = "accepted";
  } catch (e) {
    if (!(e instanceof CheckerQuit)) throw e;
    outcome = e.outcome;
    message = e.originalMessage;
  }

  winston.verbose(`Checker finished with ${outcome}: ${message}`);
  return {
    outcome,
    checkerMessage: stringToOmitted(message, options.messageLengthLimit)
  };
}
