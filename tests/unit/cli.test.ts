import { describe, expect, it } from "@jest/globals";
import { applyCliOverrides, getHelpText, parseCliArgs } from "../../src/cli";
import { DEFAULT_CONFIG } from "../../src/config";
import { ConfigError } from "../../src/core/errors";

describe("parseCliArgs", () => {
  it("reads the command and its options", () => {
    expect(
      parseCliArgs(["run", "--concurrency", "4", "--max-docs", "10", "--force", "--output", "out", "--config", "c.json"]),
    ).toEqual({
      command: "run",
      force: true,
      ignoreHttpsErrors: false,
      concurrency: 4,
      maxDocs: 10,
      configPath: "c.json",
      outputDir: "out",
    });
  });

  it("shows help for -h, a missing command or an unknown one", () => {
    expect(parseCliArgs(["run", "-h"])).toBe("help");
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["mirror"])).toBe("help");
  });

  it("drops numeric options that are not numbers", () => {
    const parsed = parseCliArgs(["retry-failed", "--concurrency", "lots"]);

    expect(parsed !== "help" && parsed.concurrency).toBeUndefined();
  });
});

describe("applyCliOverrides", () => {
  it("lets flags override the loaded config", () => {
    const parsed = parseCliArgs(["run", "--concurrency", "3", "--output", "pdfs", "--ignore-https-errors"]);
    if (parsed === "help") {
      throw new Error("expected a command");
    }

    const config = applyCliOverrides(DEFAULT_CONFIG, parsed);

    expect(config.downloadConcurrency).toBe(3);
    expect(config.outputDir).toBe("pdfs");
    expect(config.ignoreHttpsErrors).toBe(true);
    expect(config.baseUrl).toBe(DEFAULT_CONFIG.baseUrl);
  });

  it("keeps the config when no flag is given", () => {
    const parsed = parseCliArgs(["status"]);
    if (parsed === "help") {
      throw new Error("expected a command");
    }

    expect(applyCliOverrides(DEFAULT_CONFIG, parsed)).toEqual(DEFAULT_CONFIG);
  });

  it("rejects a concurrency below one", () => {
    const parsed = parseCliArgs(["run", "--concurrency", "0"]);
    if (parsed === "help") {
      throw new Error("expected a command");
    }

    expect(() => applyCliOverrides(DEFAULT_CONFIG, parsed)).toThrow(
      "downloadConcurrency must be a positive integer, got 0",
    );
  });

  it("rejects a document limit below one", () => {
    for (const value of ["0", "-1"]) {
      const parsed = parseCliArgs(["run", "--max-docs", value]);
      if (parsed === "help") {
        throw new Error("expected a command");
      }

      expect(() => applyCliOverrides(DEFAULT_CONFIG, parsed)).toThrow(ConfigError);
      expect(() => applyCliOverrides(DEFAULT_CONFIG, parsed)).toThrow(
        `--max-docs must be a positive integer, got ${value}`,
      );
    }
  });
});

describe("getHelpText", () => {
  it("lists every command", () => {
    const help = getHelpText();

    for (const command of ["crawl", "run", "retry-failed", "status"]) {
      expect(help).toContain(`  ${command} `);
    }
  });
});
