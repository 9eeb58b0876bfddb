import type { ChunkRequest, TranscriptionInvoker } from "../provider.js";
import type { ChunkTranscription } from "../types.js";
import { ProviderHttpError, sanitizeProviderErrorText } from "../errors.js";
import { parseTranscriptionResponse } from "./parse.js";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

export type OpenAiProviderOptions = {
  /** Request speaker-labelled output (`diarized_json`). */
  diarize?: boolean;
  language?: string;
  baseUrl?: string;
};

function normalizeOpenAiLanguage(code?: string): string | undefined {
  if (!code) return undefined;
  const trimmed = code.trim().toLowerCase();
  if (!trimmed) return undefined;
  const primary = trimmed.split(/[-_]/)[0];
  return primary || undefined;
}

export class OpenAiTranscriptionProvider implements TranscriptionInvoker {
  readonly name = "openai";
  private readonly baseUrl: string;

  constructor(
    private apiKey: string,
    private model: string,
    private options: OpenAiProviderOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, "");
  }

  buildForm(request: ChunkRequest): FormData {
    const { audio } = request;
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(audio.data)], { type: audio.mimeType }), audio.fileName);
    form.append("model", this.model);

    if (this.options.diarize) {
      form.append("response_format", "diarized_json");
      form.append("chunking_strategy", "auto");
    } else {
      form.append("response_format", "verbose_json");
      form.append("timestamp_granularities[]", "word");
      form.append("timestamp_granularities[]", "segment");
    }

    const language = normalizeOpenAiLanguage(this.options.language);
    if (language) form.append("language", language);
    return form;
  }

  async transcribeChunk(
    request: ChunkRequest,
    opts: { signal?: AbortSignal }
  ): Promise<ChunkTranscription> {
    const res = await fetch(`${this.baseUrl}/audio/transcriptions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: this.buildForm(request),
      signal: opts.signal,
    });

    if (!res.ok) {
      const text = await res.text();
      throw new ProviderHttpError(
        res.status,
        `OpenAI transcription API error (${res.status}): ${sanitizeProviderErrorText(
          text || res.statusText,
          [this.apiKey]
        )}`
      );
    }

    const payload: unknown = await res.json();
    return parseTranscriptionResponse(payload);
  }
}
