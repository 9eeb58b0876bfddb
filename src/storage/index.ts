import { basename, extname, join } from "node:path";
import { sanitizeFilename, writeJson, writeText } from "../utils/fs.js";
import type { GapRange, Transcript } from "../transcription/types.js";

export type OutputPaths = {
  jsonPath: string;
  txtPath: string;
  jsonlPath: string;
  gapsPath: string;
};

export function getOutputPaths(outputDir: string, sourcePath: string): OutputPaths {
  const stem = basename(sourcePath, extname(sourcePath));
  const baseName = sanitizeFilename(stem, { maxLength: 80 });
  return {
    jsonPath: join(outputDir, `${baseName}.json`),
    txtPath: join(outputDir, `${baseName}.txt`),
    jsonlPath: join(outputDir, `${baseName}.jsonl`),
    gapsPath: join(outputDir, `${baseName}.gaps.json`),
  };
}

export async function saveTranscriptJson(
  path: string,
  transcript: Transcript & { status: string; source: string }
) {
  await writeJson(path, transcript);
}

export async function saveTranscriptTxt(path: string, text: string) {
  await writeText(path, text);
}

export async function saveTranscriptJsonl(path: string, jsonl: string) {
  await writeText(path, jsonl.length > 0 ? `${jsonl}\n` : jsonl);
}

export async function saveGaps(path: string, gaps: readonly GapRange[]) {
  await writeJson(path, { gaps });
}
