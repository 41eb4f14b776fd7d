import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, ValidationError } from "../../domain/common/errors";
import { AppConfigSchema, type AppConfig } from "./schema";

type UnknownRecord = Record<string, unknown>;

export type ConfigOverrides = {
  [K in keyof AppConfig]?: AppConfig[K] extends UnknownRecord
    ? Partial<AppConfig[K]>
    : AppConfig[K];
};

export type LoadConfigArgs = {
  configPath?: string;
  overrides?: ConfigOverrides;
};

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: UnknownRecord, next: UnknownRecord): UnknownRecord {
  const out: UnknownRecord = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const prior = out[key];
    if (isRecord(prior) && isRecord(value)) {
      out[key] = deepMerge(prior, value);
    } else if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function envString(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim().length > 0 ? v : undefined;
}

function envInt(name: string): number | undefined {
  const raw = envString(name);
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? Math.trunc(n) : undefined;
}

function envFloat(name: string): number | undefined {
  const raw = envString(name);
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

function configFromEnv(): UnknownRecord {
  return {
    logLevel: envString("LOG_LEVEL"),
    store: {
      kind: envString("QA_STORE_KIND"),
      path: envString("LANCEDB_PATH"),
      table: envString("LANCEDB_TABLE_NAME"),
    },
    matcher: {
      minQuestionLength: envInt("MATCH_MIN_QUESTION_LENGTH"),
      highThreshold: envFloat("MATCH_HIGH_THRESHOLD"),
      keywordThreshold: envFloat("MATCH_KEYWORD_THRESHOLD"),
      lowThreshold: envFloat("MATCH_LOW_THRESHOLD"),
      keywordBonus: envFloat("MATCH_KEYWORD_BONUS"),
      candidateKeywords: envInt("MATCH_CANDIDATE_KEYWORDS"),
      candidateLimit: envInt("MATCH_CANDIDATE_LIMIT"),
      wideCandidateLimit: envInt("MATCH_WIDE_CANDIDATE_LIMIT"),
      stageTimeoutMs: envInt("MATCH_STAGE_TIMEOUT_MS"),
    },
    similarity: {
      sequenceWeight: envFloat("SIMILARITY_SEQUENCE_WEIGHT"),
      overlapWeight: envFloat("SIMILARITY_OVERLAP_WEIGHT"),
      lengthWeight: envFloat("SIMILARITY_LENGTH_WEIGHT"),
      importantWordBonus: envFloat("SIMILARITY_IMPORTANT_WORD_BONUS"),
    },
  };
}

async function readConfigFile(configPath: string): Promise<UnknownRecord> {
  const abs = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);
  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${abs}`, error);
  }

  const ext = path.extname(abs).toLowerCase();
  try {
    const parsed: unknown =
      ext === ".yaml" || ext === ".yml" ? YAML.parse(raw) : JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${abs}`, error);
  }
}

/**
 * File config, then environment, then explicit overrides; validated as a
 * whole against AppConfigSchema.
 */
export async function loadConfig(
  args: LoadConfigArgs = {},
): Promise<AppConfig> {
  const fileConfig = args.configPath
    ? await readConfigFile(args.configPath)
    : {};
  const envConfig = configFromEnv();
  const merged = deepMerge(
    deepMerge(fileConfig, envConfig),
    args.overrides ?? {},
  );

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ValidationError(
      `Invalid configuration:\n${issues}`,
      parsed.error,
    );
  }
  return parsed.data;
}
