import type { CheckerResult, Outcome } from "@/checkers";
import { prependOmittableString, renderOmittableString } from "@/omittableString";

const testlibMessagePrefixes: Record<Outcome, string> = {
  accepted: "ok",
  "wrong-answer": "wrong answer",
  "presentation-error": "wrong output format",
  "internal-failure": "FAIL"
};

const xmlOutcomes: Record<Outcome, string> = {
  accepted: "accepted",
  "wrong-answer": "wrong-answer",
  "presentation-error": "presentation-error",
  "internal-failure": "fail"
};

export const exitCodes: Record<Outcome, number> = {
  accepted: 0,
  "wrong-answer": 1,
  "presentation-error": 2,
  "internal-failure": 3
};

// Characters XML 1.0 doesn't allow, including surrogates left unpaired by cutting a message
const INVALID_XML_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

function escapeXml(text: string) {
  return text.replace(INVALID_XML_CHARACTERS, "\uFFFD").replace(/[&<>"]/g, char => {
    switch (char) {
      case "&":
        return "&amp;";
      case "<":
        return "&lt;";
      case ">":
        return "&gt;";
      default:
        return "&quot;";
    }
  });
}

/**
 * e.g. `wrong answer expected YES 1 2, found YES 1 3`
 */
export function formatTestlibMessage({ outcome, checkerMessage }: CheckerResult) {
  return renderOmittableString(prependOmittableString(`${testlibMessagePrefixes[outcome]} `, checkerMessage, true));
}

/**
 * The content of the report file. With `appes` it's the XML report that judging systems parse
 * for the outcome, otherwise the plain testlib message.
 */
export function renderReport(result: CheckerResult, appes: boolean) {
  if (!appes) return formatTestlibMessage(result);
  return (
    '<?xml version="1.0" encoding="utf-8"?>' +
    `<result outcome = "${xmlOutcomes[result.outcome]}">` +
    escapeXml(renderOmittableString(result.checkerMessage)) +
    "</result>"
  );
}
