import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import dotenv from "dotenv";
import YAML from "yaml";
import { configSchema, type AppConfig } from "./schema.js";

export type PartialConfig = Partial<Record<keyof AppConfig, unknown>>;

function loadYamlConfig(path: string): PartialConfig {
  if (!existsSync(path)) return {};
  const raw = readFileSync(path, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return {};
  return parsed;
}

function loadEnvConfig(): PartialConfig {
  dotenv.config();
  const env = process.env;
  const parseOptionalBool = (raw: string | undefined): boolean | undefined => {
    if (raw === undefined) return undefined;
    const v = raw.trim().toLowerCase();
    return v === "true" || v === "1" || v === "yes";
  };
  const parseOptionalNumber = (raw: string | undefined): number | undefined =>
    raw ? Number(raw) : undefined;
  return {
    openaiApiKey: env.CHUNKSCRIBE_OPENAI_API_KEY || env.OPENAI_API_KEY,
    openaiModel: env.CHUNKSCRIBE_OPENAI_MODEL,
    openaiBaseUrl: env.CHUNKSCRIBE_OPENAI_BASE_URL,
    language: env.CHUNKSCRIBE_LANGUAGE,
    diarize: parseOptionalBool(env.CHUNKSCRIBE_DIARIZE),
    outputDir: env.CHUNKSCRIBE_OUTPUT_DIR,
    chunkDurationMs: parseOptionalNumber(env.CHUNKSCRIBE_CHUNK_DURATION_MS),
    overlapMs: parseOptionalNumber(env.CHUNKSCRIBE_OVERLAP_MS),
    maxOverlapChars: parseOptionalNumber(env.CHUNKSCRIBE_MAX_OVERLAP_CHARS),
    epsilonSec: parseOptionalNumber(env.CHUNKSCRIBE_EPSILON_SEC),
    concurrency: parseOptionalNumber(env.CHUNKSCRIBE_CONCURRENCY),
    chunkRetries: parseOptionalNumber(env.CHUNKSCRIBE_CHUNK_RETRIES),
    retryBaseDelayMs: parseOptionalNumber(env.CHUNKSCRIBE_RETRY_BASE_DELAY_MS),
    retryMaxDelayMs: parseOptionalNumber(env.CHUNKSCRIBE_RETRY_MAX_DELAY_MS),
    chunkTimeoutMs: parseOptionalNumber(env.CHUNKSCRIBE_CHUNK_TIMEOUT_MS),
    ffmpegPath: env.FFMPEG_PATH,
    ffprobePath: env.FFPROBE_PATH,
  };
}

function filterUndefined(obj: PartialConfig): PartialConfig {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  );
}

export type ConfigSourceSnapshots = {
  yamlConfig: PartialConfig;
  envConfig: PartialConfig;
};

export function loadConfigSourceSnapshots(
  configPath = "config.yaml"
): ConfigSourceSnapshots {
  return {
    yamlConfig: loadYamlConfig(resolve(configPath)),
    envConfig: filterUndefined(loadEnvConfig()),
  };
}

export function loadConfig(
  configPath = "config.yaml",
  overrides: PartialConfig = {}
): AppConfig {
  const { yamlConfig, envConfig } = loadConfigSourceSnapshots(configPath);

  // Precedence: config.yaml (lowest) < .env/environment < explicit overrides (CLI)
  const merged = { ...yamlConfig, ...envConfig, ...filterUndefined(overrides) };
  return configSchema.parse(merged);
}
