import "reflect-metadata";
import os from "os";
import fs from "fs";

import { plainToInstance, Type } from "class-transformer";
import { validateSync, IsInt, IsPositive, Min, ValidateNested } from "class-validator";
import winston from "winston";
import { load as loadYaml } from "js-yaml";

import { ConfigurationError } from "./error";

winston.add(
  new winston.transports.Console({
    level: process.env.FRACTION_CHECKER_LOG_LEVEL || "info",
    format: winston.format.combine(winston.format.cli())
  })
);

export class FractionConfig {
  // Exclusive, both parts of a fraction must be less than it
  @Min(2)
  @IsInt()
  upperBound = 1000000;
}

export class ReportConfig {
  @IsPositive()
  @IsInt()
  messageLengthLimit = 256;
}

export class BatchConfig {
  @IsPositive()
  @IsInt()
  maxConcurrentChecks = 4;
}

export class Config {
  @ValidateNested()
  @Type(() => FractionConfig)
  fraction = new FractionConfig();

  @ValidateNested()
  @Type(() => ReportConfig)
  report = new ReportConfig();

  @ValidateNested()
  @Type(() => BatchConfig)
  batch = new BatchConfig();
}

/**
 * Missing items take their default values.
 */
export function parseConfig(parsedConfig: unknown): Config {
  if (parsedConfig == null) parsedConfig = {};
  if (typeof parsedConfig !== "object" || Array.isArray(parsedConfig))
    throw new ConfigurationError("Config must be a mapping");

  const config = plainToInstance(Config, parsedConfig, { exposeDefaultValues: true });
  const errors = validateSync(config);
  if (errors.length > 0) throw new ConfigurationError(`Couldn't parse config: ${JSON.stringify(errors, null, 2)}`);

  return config;
}

export function loadConfigFile(filePath: string) {
  return parseConfig(loadYaml(fs.readFileSync(filePath).toString("utf-8")));
}

function loadConfig() {
  const filePath = process.env.FRACTION_CHECKER_CONFIG_FILE;
  if (!filePath) return parseConfig({});

  try {
    return loadConfigFile(filePath);
  } catch (e) {
    winston.error(`Couldn't load config file ${filePath}: ${e instanceof Error ? e.message : e}`);
    process.exit(1);
  }
}

const config = loadConfig();

// Check config (warnings)
const cpuCount = os.cpus().length;
if (config.batch.maxConcurrentChecks > cpuCount) {
  winston.warn(
    `config.batch.maxConcurrentChecks = ${config.batch.maxConcurrentChecks}, which is larger than the number of CPU cores (= ${cpuCount}).`
  );
}

export default config;
