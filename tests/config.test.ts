import fs from "fs";
import os from "os";
import { join } from "path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { Config, loadConfigFile, parseConfig } from "@/config";
import { ConfigurationError } from "@/error";

describe("parseConfig", () => {
  it("uses default values", () => {
    const config = parseConfig({});
    expect(config).toBeInstanceOf(Config);
    expect(config.fraction.upperBound).toBe(1000000);
    expect(config.report.messageLengthLimit).toBe(256);
    expect(config.batch.maxConcurrentChecks).toBe(4);
  });

  it("treats an empty document as an empty config", () => {
    expect(parseConfig(null).fraction.upperBound).toBe(1000000);
  });

  it("overrides only the given items", () => {
    const config = parseConfig({ report: { messageLengthLimit: 64 } });
    expect(config.report.messageLengthLimit).toBe(64);
    expect(config.fraction.upperBound).toBe(1000000);
  });

  it("rejects invalid values", () => {
    expect(() => parseConfig({ batch: { maxConcurrentChecks: 0 } })).toThrow(ConfigurationError);
    expect(() => parseConfig({ fraction: { upperBound: 1.5 } })).toThrow(ConfigurationError);
  });

  it("rejects a config that isn't a mapping", () => {
    expect(() => parseConfig([1, 2])).toThrow("Config must be a mapping");
    expect(() => parseConfig("fraction")).toThrow("Config must be a mapping");
  });
});

describe("loadConfigFile", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.promises.mkdtemp(join(os.tmpdir(), "fraction-checker-config-"));
  });

  afterEach(async () => {
    await fs.promises.rm(directory, { recursive: true, force: true });
  });

  it("reads a YAML file", async () => {
    const filePath = join(directory, "config.yaml");
    await fs.promises.writeFile(filePath, "fraction:\n  upperBound: 1000\nbatch:\n  maxConcurrentChecks: 2\n");

    const config = loadConfigFile(filePath);
    expect(config.fraction.upperBound).toBe(1000);
    expect(config.batch.maxConcurrentChecks).toBe(2);
    expect(config.report.messageLengthLimit).toBe(256);
  });
});
