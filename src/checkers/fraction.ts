export type Verdict = "YES" | "NO";

export interface Fraction {
  numerator: bigint;
  denominator: bigint;
}

export type Claim = { verdict: "NO" } | { verdict: "YES"; fraction: Fraction };

export function isVerdict(word: string): word is Verdict {
  return word === "YES" || word === "NO";
}

/**
 * Uppercases ASCII letters only, other characters are kept as-is.
 */
export function upper(word: string) {
  return word.replace(/[a-z]+/g, letters => letters.toUpperCase());
}

export function gcd(a: bigint, b: bigint): bigint {
  if (a < 0n) a = -a;
  if (b < 0n) b = -b;
  while (b !== 0n) [a, b] = [b, a % b];
  return a;
}

export function reduceFraction({ numerator, denominator }: Fraction): Fraction {
  const divisor = gcd(numerator, denominator);
  if (divisor === 0n) return { numerator, denominator };
  return { numerator: numerator / divisor, denominator: denominator / divisor };
}

/**
 * Two fractions are equivalent iff they are identical after each is reduced by its own GCD.
 * Exact integer arithmetic, never floating point.
 */
export function compFraction(a: Fraction, b: Fraction) {
  const reducedA = reduceFraction(a);
  const reducedB = reduceFraction(b);
  return reducedA.numerator === reducedB.numerator && reducedA.denominator === reducedB.denominator;
}

export function formatClaim(claim: Claim) {
  if (claim.verdict === "NO") return "NO";
  return `YES ${claim.fraction.numerator} ${claim.fraction.denominator}`;
}
