import fs from "fs";

import winston from "winston";

import config from "./config";
import { checkFiles, checkTestcases, collectTestcases } from "./batch";
import type { CheckOptions } from "./batch";
import { ConfigurationError } from "./error";
import { exitCodes, formatTestlibMessage, renderReport } from "./report";

const USAGE = [
  "Usage:",
  "  fraction-verdict-checker <input-file> <output-file> <answer-file> [<report-file> [-appes]]",
  "  fraction-verdict-checker --batch <tests-directory> <outputs-directory>"
].join("\n");

// testlib's exit code for a failed checker
const FAIL_EXIT_CODE = exitCodes["internal-failure"];

const checkOptions: CheckOptions = {
  fractionUpperBound: config.fraction.upperBound,
  messageLengthLimit: config.report.messageLengthLimit
};

async function runSingle(args: string[]) {
  const [inputFile, outputFile, answerFile, reportFile, flag] = args;
  if (args.length > 5 || (flag !== undefined && flag !== "-appes")) {
    process.stderr.write(`${USAGE}\n`);
    return FAIL_EXIT_CODE;
  }

  const result = await checkFiles({ inputFile, outputFile, answerFile }, checkOptions);
  process.stderr.write(`${formatTestlibMessage(result)}\n`);
  if (reportFile !== undefined) await fs.promises.writeFile(reportFile, renderReport(result, flag === "-appes"));

  return exitCodes[result.outcome];
}

async function runBatch(args: string[]) {
  if (args.length !== 2) {
    process.stderr.write(`${USAGE}\n`);
    return FAIL_EXIT_CODE;
  }

  const [testsDirectory, outputsDirectory] = args;
  const testcases = await collectTestcases(testsDirectory, outputsDirectory);
  winston.info(`Checking ${testcases.length} testcases`);

  const results = await checkTestcases(testcases, {
    ...checkOptions,
    maxConcurrentChecks: config.batch.maxConcurrentChecks
  });
  for (const result of results) process.stdout.write(`${result.name}: ${formatTestlibMessage(result)}\n`);

  return results.some(result => result.outcome === "internal-failure") ? FAIL_EXIT_CODE : 0;
}

async function main(argv: string[]) {
  if (argv[0] === "--batch") return await runBatch(argv.slice(1));
  if (argv.length < 3) {
    process.stderr.write(`${USAGE}\n`);
    return FAIL_EXIT_CODE;
  }
  return await runSingle(argv);
}

main(process.argv.slice(2)).then(
  exitCode => process.exit(exitCode),
  (e: unknown) => {
    if (e instanceof ConfigurationError) winston.error(e.message);
    else winston.error(`Unexpected error: ${e instanceof Error ? e.stack : e}`);
    process.exit(FAIL_EXIT_CODE);
  }
);
