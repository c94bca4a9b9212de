import fs from "fs";

import Queue from "promise-queue";
import winston from "winston";

import { runChecker } from "@/checkers";
import type { CheckerResult, CheckerRunOptions } from "@/checkers";
import { checkYesNoFraction } from "@/checkers/yesNoFraction";
import type { YesNoFractionOptions } from "@/checkers/yesNoFraction";
import { ConfigurationError } from "@/error";
import { TrustedStream, UntrustedStream } from "@/stream";
import { isErrnoException, readTextFile, safelyJoinPath } from "@/utils";

export type CheckOptions = YesNoFractionOptions & CheckerRunOptions;

export interface BatchCheckOptions extends CheckOptions {
  maxConcurrentChecks: number;
}

export interface CheckerFiles {
  inputFile: string;
  outputFile: string;
  answerFile: string;
}

export interface Testcase extends CheckerFiles {
  name: string;
}

export interface TestcaseResult extends CheckerResult {
  name: string;
}

const ANSWER_FILE_SUFFIX = ".a";

/**
 * Tests are laid out as `<name>` (input) and `<name>.a` (answer) in the tests directory, and the
 * contestant's output for `<name>` is `<name>` in the outputs directory.
 */
export async function collectTestcases(testsDirectory: string, outputsDirectory: string): Promise<Testcase[]> {
  const entries = await fs.promises.readdir(testsDirectory, { withFileTypes: true });
  const fileNames = new Set(entries.filter(entry => entry.isFile()).map(entry => entry.name));

  return Array.from(fileNames)
    .filter(fileName => !fileName.endsWith(ANSWER_FILE_SUFFIX))
    .sort()
    .map(name => {
      if (!fileNames.has(name + ANSWER_FILE_SUFFIX))
        throw new ConfigurationError(`Answer not specified for test input ${name}`);

      return {
        name,
        inputFile: safelyJoinPath(testsDirectory, name),
        answerFile: safelyJoinPath(testsDirectory, name + ANSWER_FILE_SUFFIX),
        outputFile: safelyJoinPath(outputsDirectory, name)
      };
    });
}

/**
 * @returns `null` if the output is too large to be held in a string.
 */
async function readOutputFile(filePath: string): Promise<string | null> {
  try {
    return await readTextFile(filePath, true);
  } catch (e) {
    if (isErrnoException(e) && e.code === "ERR_STRING_TOO_LONG") return null;
    throw e;
  }
}

export async function checkFiles(files: CheckerFiles, options: CheckOptions): Promise<CheckerResult> {
  const [input, output, answer] = await Promise.all([
    readTextFile(files.inputFile),
    readOutputFile(files.outputFile),
    readTextFile(files.answerFile)
  ]);
  if (output === null) return { outcome: "presentation-error", checkerMessage: "Output file is too large" };

  return runChecker(
    checkYesNoFraction,
    {
      input: new TrustedStream("input", input),
      output: new UntrustedStream("output", output),
      answer: new TrustedStream("answer", answer)
    },
    options
  );
}

/**
 * Results are in the same order as `testcases`.
 */
export async function checkTestcases(testcases: Testcase[], options: BatchCheckOptions): Promise<TestcaseResult[]> {
  const queue = new Queue(options.maxConcurrentChecks, Infinity);

  return await Promise.all(
    testcases.map(testcase =>
      queue.add(async (): Promise<TestcaseResult> => {
        winston.verbose(`Checking testcase ${testcase.name}`);
        const result = await checkFiles(testcase, options);
        if (result.outcome === "internal-failure")
          winston.error(`Test data of testcase ${testcase.name} is inconsistent: ${JSON.stringify(result)}`);
        return { name: testcase.name, ...result };
      })
    )
  );
}
