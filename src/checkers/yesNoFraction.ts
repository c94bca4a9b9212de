import { quoteToken } from "@/stream";
import type { TokenStream } from "@/stream";

import { ensure, quit } from ".";
import type { Check } from ".";
import { compFraction, formatClaim, isVerdict, upper } from "./fraction";
import type { Claim, Fraction } from "./fraction";

export interface YesNoFractionOptions {
  /**
   * Both parts of a fraction must be in `[1, fractionUpperBound - 1]`.
   */
  fractionUpperBound: number;
}

// The divisor 10^n is built digit by digit
const MAX_DIGIT_COUNT = 100000;

// The input is trusted: `s` is read like atoll(), taking its leading integer and 0 if there is none
function parseLeadingInteger(s: string): bigint {
  const match = /^[+-]?\d+/.exec(s.trim());
  return match ? BigInt(match[0]) : 0n;
}

/**
 * Checks an answer of the form `NO`, or `YES a b` where `a / b` equals the value `c / 10^n` given by
 * the input. The jury's answer decides whether YES is possible at all.
 */
export const checkYesNoFraction: Check<YesNoFractionOptions> = (
  { input: inf, output: ouf, answer: ans },
  { fractionUpperBound }
) => {
  let n = inf.readInt("n");
  if (n < 0 || n > MAX_DIGIT_COUNT)
    quit("internal-failure", `Integer parameter [name=n] equals to ${n}, violates the range [0, ${MAX_DIGIT_COUNT}]`);
  inf.readEoln();
  const c = parseLeadingInteger(inf.readString("s"));

  let b = 1n;
  while (n-- > 0) b *= 10n;
  const target: Fraction = { numerator: c, denominator: b };

  const maxPart = BigInt(fractionUpperBound) - 1n;
  const readFraction = (stream: TokenStream, prefix: string): Fraction => {
    const numerator = stream.readLong(1n, maxPart, `${prefix}_a`);
    const denominator = stream.readLong(1n, maxPart, `${prefix}_b`);
    return { numerator, denominator };
  };

  const ja = upper(ans.readWord("ja"));
  const pa = upper(ouf.readWord("pa"));

  if (!isVerdict(pa)) quit("presentation-error", `YES or NO expected, but ${quoteToken(pa)} found`);
  if (!isVerdict(ja)) quit("internal-failure", `YES or NO expected in answer, but ${quoteToken(ja)} found`);

  if (ja !== pa) {
    let juryClaim: Claim;
    let participantClaim: Claim;
    if (pa === "YES") {
      const fraction = readFraction(ouf, "out");
      juryClaim = { verdict: "NO" };
      participantClaim = { verdict: "YES", fraction };
      ensure(!compFraction(target, fraction), `Jury fail ${formatClaim(juryClaim)}`);
    } else {
      const fraction = readFraction(ans, "ans");
      juryClaim = { verdict: "YES", fraction };
      participantClaim = { verdict: "NO" };
      ensure(compFraction(target, fraction), `Jury fail ${formatClaim(juryClaim)}`);
    }
    quit("wrong-answer", `expected ${formatClaim(juryClaim)}, found ${formatClaim(participantClaim)}`);
  }

  if (ja === "NO") return `answer is ${formatClaim({ verdict: "NO" })}`;

  // Jury's fraction comes before the participant's on the wire
  const answerFraction = readFraction(ans, "ans");
  const outputFraction = readFraction(ouf, "out");
  const juryClaim: Claim = { verdict: "YES", fraction: answerFraction };
  const participantClaim: Claim = { verdict: "YES", fraction: outputFraction };
  const mismatch = `expected ${formatClaim(juryClaim)}, found ${formatClaim(participantClaim)}`;

  ensure(answerFraction.numerator < answerFraction.denominator, `Jury fail ${formatClaim(juryClaim)}`);
  ensure(answerFraction.numerator !== 0n, `Jury fail ${formatClaim(juryClaim)}`);
  ensure(compFraction(target, answerFraction), `Jury fail ${formatClaim(juryClaim)}`);

  if (outputFraction.numerator >= outputFraction.denominator) quit("wrong-answer", "A must be less than B");
  if (outputFraction.numerator === 0n) quit("wrong-answer", mismatch);
  if (!compFraction(target, outputFraction)) quit("wrong-answer", mismatch);

  return `answer is ${formatClaim(juryClaim)}`;
};
