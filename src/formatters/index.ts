export { formatTxt } from "./txt.js";
export type { TxtMeta } from "./txt.js";
export { formatJsonl } from "./jsonl.js";
export type { TranscriptJsonlLine } from "./jsonl.js";
