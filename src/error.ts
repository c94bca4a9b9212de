/**
 * This means the error is caused by wrong configuration of something "configured" by user.
 * e.g. an invalid config file, or a testcase without an answer file.
 */

import type { Outcome } from "./checkers";

export class ConfigurationError extends Error {}

/**
 * Thrown to end a check with a verdict. Only the checker runner catches it.
 */
export class CheckerQuit extends Error {
  constructor(public outcome: Outcome, public originalMessage: string) {
    super(`${outcome}: ${originalMessage}`);
  }
}
