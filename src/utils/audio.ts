import { promises as fs } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { execCommand } from "./exec.js";
import { validateFfmpegInstalled, validateFfprobeInstalled } from "./deps.js";

export type AudioSlice = {
  startMs: number;
  endMs: number;
  data: Uint8Array;
  fileName: string;
  mimeType: string;
};

/**
 * Decoded audio with a known duration. Slices are read-only views and may
 * be requested concurrently.
 */
export interface AudioSource {
  readonly durationMs: number;
  slice(startMs: number, endMs: number, signal?: AbortSignal): Promise<AudioSlice>;
}

export async function getAudioDurationSeconds(
  audioPath: string,
  ffprobePath?: string
): Promise<number> {
  const ffprobe = await validateFfprobeInstalled(ffprobePath);
  const args = [
    "-v",
    "error",
    "-show_entries",
    "format=duration",
    "-of",
    "default=noprint_wrappers=1:nokey=1",
    audioPath,
  ];
  const res = await execCommand(ffprobe, args);
  if (res.exitCode !== 0) {
    throw new Error(`ffprobe failed: ${res.stderr.trim() || res.stdout.trim()}`);
  }
  const raw = res.stdout.trim();
  const duration = Number(raw);
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new Error(`Invalid audio duration from ffprobe: ${raw}`);
  }
  return duration;
}

export class FfmpegAudioSource implements AudioSource {
  private constructor(
    private readonly path: string,
    private readonly ffmpeg: string,
    readonly durationMs: number
  ) {}

  static async open(
    path: string,
    opts: { ffmpegPath?: string; ffprobePath?: string } = {}
  ): Promise<FfmpegAudioSource> {
    const seconds = await getAudioDurationSeconds(path, opts.ffprobePath);
    const ffmpeg = await validateFfmpegInstalled(opts.ffmpegPath);
    return new FfmpegAudioSource(path, ffmpeg, Math.round(seconds * 1000));
  }

  async slice(startMs: number, endMs: number, signal?: AbortSignal): Promise<AudioSlice> {
    const tmp = await fs.mkdtemp(join(tmpdir(), "chunkscribe-slice-"));
    const fileName = `slice_${String(startMs).padStart(9, "0")}.flac`;
    const outPath = join(tmp, fileName);
    const args = [
      "-y",
      "-ss",
      (startMs / 1000).toFixed(3),
      "-t",
      (Math.max(1, endMs - startMs) / 1000).toFixed(3),
      "-i",
      this.path,
      "-vn",
      "-c:a",
      "flac",
      outPath,
    ];
    try {
      const res = await execCommand(this.ffmpeg, args, { signal });
      if (res.exitCode !== 0) {
        throw new Error(`ffmpeg slice failed: ${res.stderr.trim() || res.stdout.trim()}`);
      }
      const data = await fs.readFile(outPath);
      return { startMs, endMs, data, fileName, mimeType: "audio/flac" };
    } finally {
      await fs.rm(tmp, { recursive: true, force: true });
    }
  }
}
