import type { AppConfig } from "../config/schema.js";
import type { TranscriptionInvoker } from "./provider.js";
import { OpenAiTranscriptionProvider } from "./openai/index.js";

export const DEFAULT_OPENAI_MODEL = "whisper-1";
export const DEFAULT_OPENAI_DIARIZE_MODEL = "gpt-4o-transcribe-diarize";

// whisper-1 cannot return diarized_json.
export function resolveOpenAiModel(config: Pick<AppConfig, "openaiModel" | "diarize">): string {
  if (config.openaiModel) return config.openaiModel;
  return config.diarize ? DEFAULT_OPENAI_DIARIZE_MODEL : DEFAULT_OPENAI_MODEL;
}

export function createTranscriptionProvider(config: AppConfig): TranscriptionInvoker {
  if (!config.openaiApiKey) {
    throw new Error("openaiApiKey is required (set OPENAI_API_KEY)");
  }
  return new OpenAiTranscriptionProvider(config.openaiApiKey, resolveOpenAiModel(config), {
    diarize: config.diarize,
    language: config.language,
    baseUrl: config.openaiBaseUrl,
  });
}
