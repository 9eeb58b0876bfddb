import { promises as fs } from "node:fs";
import { dirname, join, basename } from "node:path";
import { randomUUID } from "node:crypto";

/**
 * Turns an arbitrary name into a portable file stem: accents stripped,
 * anything outside word characters and `-` collapsed to single dashes.
 */
export function sanitizeFilename(input: string, options: { maxLength?: number } = {}): string {
  const maxLength = options.maxLength ?? 60;
  const slug = input
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^\w-]+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^[-_]+|[-_]+$/g, "")
    .slice(0, maxLength)
    .replace(/[-_]+$/, "");
  return slug || "untitled";
}

export async function ensureDir(path: string) {
  await fs.mkdir(path, { recursive: true });
}

// Readers never see a half-written file: write beside the target, then rename.
async function writeAtomic(path: string, contents: string) {
  await ensureDir(dirname(path));
  const tmp = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmp, contents, "utf8");
    await fs.rename(tmp, path);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

export async function writeJson(path: string, data: unknown) {
  await writeAtomic(path, `${JSON.stringify(data, null, 2)}\n`);
}

export async function writeText(path: string, text: string) {
  await writeAtomic(path, text);
}

export async function fileExists(path: string): Promise<boolean> {
  return fs.stat(path).then(
    () => true,
    () => false
  );
}
