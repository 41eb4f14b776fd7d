import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { loadConfig } from "../../src/infrastructure/config/load";
import { ConfigError, ValidationError } from "../../src/domain/common/errors";

const originalEnv = { ...process.env };

beforeEach(() => {
  for (const key of Object.keys(process.env)) {
    if (
      key === "LOG_LEVEL" ||
      key === "QA_STORE_KIND" ||
      key.startsWith("LANCEDB_") ||
      key.startsWith("MATCH_") ||
      key.startsWith("SIMILARITY_")
    ) {
      delete process.env[key];
    }
  }
});

afterEach(() => {
  process.env = { ...originalEnv };
});

describe("loadConfig", () => {
  it("fills defaults when nothing is configured", async () => {
    const cfg = await loadConfig();
    expect(cfg.logLevel).toBe("info");
    expect(cfg.store).toEqual({ kind: "lancedb", path: "lancedb", table: "qa_records" });
    expect(cfg.matcher.highThreshold).toBe(0.7);
    expect(cfg.matcher.minQuestionLength).toBe(2);
    expect(cfg.similarity.overlapWeight).toBe(0.6);
  });

  it("loads YAML config and validates", async () => {
    const dir = await writeTempDir();
    const configPath = path.join(dir, "cfg.yaml");
    await writeFile(
      configPath,
      [
        "logLevel: warn",
        "store:",
        "  kind: memory",
        "matcher:",
        "  highThreshold: 0.8",
        "  shortAnswers:",
        "    halo: Hai juga",
        "",
      ].join("\n"),
      "utf8",
    );

    const cfg = await loadConfig({ configPath });
    expect(cfg.logLevel).toBe("warn");
    expect(cfg.store.kind).toBe("memory");
    expect(cfg.matcher.highThreshold).toBe(0.8);
    expect(cfg.matcher.lowThreshold).toBe(0.5);
    expect(cfg.matcher.shortAnswers).toEqual({ halo: "Hai juga" });
  });

  it("applies env over file config and overrides over env", async () => {
    const dir = await writeTempDir();
    const configPath = path.join(dir, "cfg.json");
    await writeFile(
      configPath,
      JSON.stringify({ logLevel: "error", matcher: { candidateLimit: 10 } }),
      "utf8",
    );

    process.env.LOG_LEVEL = "debug";
    process.env.MATCH_CANDIDATE_LIMIT = "25";
    process.env.MATCH_KEYWORD_THRESHOLD = "0.45";
    const cfg = await loadConfig({
      configPath,
      overrides: { matcher: { candidateLimit: 30 } },
    });
    expect(cfg.logLevel).toBe("debug");
    expect(cfg.matcher.candidateLimit).toBe(30);
    expect(cfg.matcher.keywordThreshold).toBe(0.45);
  });

  it("rejects a low threshold above the high threshold", async () => {
    await expect(
      loadConfig({ overrides: { matcher: { highThreshold: 0.4, lowThreshold: 0.6 } } }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("reports unreadable config files", async () => {
    await expect(
      loadConfig({ configPath: path.join(os.tmpdir(), "qa-match-missing", "cfg.yaml") }),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

async function writeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "qa-match-"));
}
