import { runChecker } from "@/checkers";
import type { CheckerResult } from "@/checkers";
import { checkYesNoFraction } from "@/checkers/yesNoFraction";
import { CheckerQuit } from "@/error";
import { TrustedStream, UntrustedStream } from "@/stream";

export function check(
  input: string,
  answer: string,
  output: string,
  { fractionUpperBound = 1000000, messageLengthLimit = 256 } = {}
): CheckerResult {
  return runChecker(
    checkYesNoFraction,
    {
      input: new TrustedStream("input", input),
      output: new UntrustedStream("output", output),
      answer: new TrustedStream("answer", answer)
    },
    { fractionUpperBound, messageLengthLimit }
  );
}

export function catchQuit(fn: () => unknown): CheckerQuit {
  try {
    fn();
  } catch (e) {
    if (e instanceof CheckerQuit) return e;
    throw e;
  }
  throw new Error("Expected the read to fail");
}
