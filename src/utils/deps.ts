import { execCommand } from "./exec.js";
import { logDebug } from "./logger.js";

type ToolSpec = {
  binary: "ffmpeg" | "ffprobe";
  envVar: string;
  hint: string;
};

const FFMPEG: ToolSpec = {
  binary: "ffmpeg",
  envVar: "FFMPEG_PATH",
  hint: "Install ffmpeg from https://ffmpeg.org/download.html",
};

const FFPROBE: ToolSpec = {
  binary: "ffprobe",
  envVar: "FFPROBE_PATH",
  hint: "ffprobe ships with ffmpeg: https://ffmpeg.org/download.html",
};

const resolved = new Map<string, Promise<string>>();

async function runsVersion(candidate: string): Promise<boolean> {
  try {
    const res = await execCommand(candidate, ["-version"]);
    return res.exitCode === 0;
  } catch (error) {
    logDebug(`${candidate} -version failed: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

async function locate(spec: ToolSpec, explicitPath?: string): Promise<string> {
  const candidates = [
    explicitPath,
    process.env[spec.envVar],
    spec.binary,
    `${spec.binary}.exe`,
  ].filter((c): c is string => !!c);

  for (const candidate of candidates) {
    if (await runsVersion(candidate)) return candidate;
  }
  throw new Error(
    `${spec.binary} not found (tried ${candidates.join(", ")}).\n` +
      `  ${spec.hint}\n` +
      `  Put it on PATH or set ${spec.envVar}.`
  );
}

function resolveTool(spec: ToolSpec, explicitPath?: string): Promise<string> {
  const key = `${spec.binary}:${explicitPath ?? ""}`;
  let pending = resolved.get(key);
  if (!pending) {
    // A failed lookup is retried on the next call.
    pending = locate(spec, explicitPath).catch((error: unknown) => {
      resolved.delete(key);
      throw error;
    });
    resolved.set(key, pending);
  }
  return pending;
}

export function validateFfmpegInstalled(explicitPath?: string): Promise<string> {
  return resolveTool(FFMPEG, explicitPath);
}

export function validateFfprobeInstalled(explicitPath?: string): Promise<string> {
  return resolveTool(FFPROBE, explicitPath);
}
