const NO_COLOR =
  process.env.NO_COLOR === "1" ||
  process.env.NO_COLOR === "true" ||
  process.env.FORCE_COLOR === "0";

const paint = (code: string) => (text: string) =>
  NO_COLOR ? text : `\x1b[${code}m${text}\x1b[0m`;

const dim = paint("2");
const cyan = paint("36");
const blue = paint("34");
const magenta = paint("35");
const yellow = paint("33");
const red = paint("31;1");
const boldGreen = paint("1;32");

export type LogStage = "plan" | "dispatch" | "retry" | "gap" | "fold" | "done";

const STAGE_TAGS: Record<LogStage, { tag: string; colorize: (t: string) => string }> = {
  plan: { tag: "PLAN", colorize: cyan },
  dispatch: { tag: "TX", colorize: magenta },
  retry: { tag: "RETRY", colorize: yellow },
  gap: { tag: "GAP", colorize: red },
  fold: { tag: "FOLD", colorize: blue },
  done: { tag: "DONE", colorize: boldGreen },
};

// With --json-events, stdout carries events only.
function infoStream(): NodeJS.WriteStream {
  return process.env.CHUNKSCRIBE_JSON_EVENTS === "1" ? process.stderr : process.stdout;
}

export function logInfo(message: string) {
  infoStream().write(`${cyan("[info]")} ${message}\n`);
}

export function logWarn(message: string) {
  process.stderr.write(`${yellow("[warn]")} ${message}\n`);
}

export function logError(message: string) {
  process.stderr.write(`${red("[error]")} ${message}\n`);
}

export function logDebug(message: string) {
  if (process.env.CHUNKSCRIBE_DEBUG !== "1") return;
  process.stderr.write(`${dim(`[debug] ${message}`)}\n`);
}

export function logStep(stage: LogStage, message: string) {
  const { tag, colorize } = STAGE_TAGS[stage];
  infoStream().write(`${colorize(`[${tag} ${stage}]`)} ${message}\n`);
}
