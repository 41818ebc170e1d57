import { DEFAULT_DEBOUNCE_MS } from "../../src/review/persistence.engine";

export type ReviewCommand = "review" | "help" | "version";

export interface ReviewCliArgs {
  readonly command: ReviewCommand;
  readonly filePath?: string;
  readonly port: number;
  readonly outputDir?: string;
  readonly openBrowser: boolean;
  readonly debounceMs: number;
  readonly verbose: boolean;
  readonly uiDistDir?: string;
}

export const REVIEW_ENV_KEYS = Object.freeze({
  PORT: "LINE_REVIEW_PORT",
  OUTPUT_DIR: "LINE_REVIEW_OUTPUT_DIR",
  NO_OPEN: "LINE_REVIEW_NO_OPEN",
  UI_DIST_DIR: "LINE_REVIEW_UI_DIST_DIR",
} as const);

const MAX_PORT = 65535;

export const USAGE = `line-review: inline line-range review for text documents

Usage:
  line-review <file>            Open a file for review in your browser
  line-review help              Show this help message

Options:
  -p, --port <port>             Port to listen on (default: random)
  -o, --output <dir>            Output directory for review files (default: beside the file)
      --no-open                 Don't open the browser
      --debounce-ms <ms>        Quiet period before review files are written (default: ${String(DEFAULT_DEBOUNCE_MS)})
      --verbose                 Log every write
  -v, --version                 Print version

Environment:
  ${REVIEW_ENV_KEYS.PORT}              Default port
  ${REVIEW_ENV_KEYS.OUTPUT_DIR}        Default output directory
  ${REVIEW_ENV_KEYS.NO_OPEN}           Set to 1 to never open the browser
  ${REVIEW_ENV_KEYS.UI_DIST_DIR}       Directory holding the built UI
`;

function nonEmpty(value: string | undefined): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

export function parsePort(raw: string, source: string): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > MAX_PORT) {
    throw new Error(`CONFIGURATION_ERROR ${source} must be an integer between 0 and ${String(MAX_PORT)}, got "${raw}"`);
  }
  return parsed;
}

function parseDebounce(raw: string): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`CONFIGURATION_ERROR --debounce-ms must be a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

function isTruthyFlag(value: string | undefined): boolean {
  const normalized = nonEmpty(value)?.toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

/** Flags win over environment variables, which win over defaults. */
export function parseReviewArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): ReviewCliArgs {
  const positional: string[] = [];
  let portFromFlag: number | undefined;
  let outputFromFlag: string | undefined;
  let noOpen = false;
  let debounceMs = DEFAULT_DEBOUNCE_MS;
  let verbose = false;
  let wantsHelp = false;
  let wantsVersion = false;

  const takeValue = (index: number, flag: string): string => {
    const next = nonEmpty(argv[index + 1]);
    if (next === undefined) {
      throw new Error(`CONFIGURATION_ERROR ${flag} requires a value`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === undefined || token === "--") {
      continue;
    }
    if (token === "-h" || token === "--help") {
      wantsHelp = true;
      continue;
    }
    if (token === "-v" || token === "--version") {
      wantsVersion = true;
      continue;
    }
    if (token === "-p" || token === "--port") {
      portFromFlag = parsePort(takeValue(i, token), token);
      i += 1;
      continue;
    }
    if (token === "-o" || token === "--output") {
      outputFromFlag = takeValue(i, token);
      i += 1;
      continue;
    }
    if (token === "--no-open") {
      noOpen = true;
      continue;
    }
    if (token === "--debounce-ms") {
      debounceMs = parseDebounce(takeValue(i, token));
      i += 1;
      continue;
    }
    if (token === "--verbose") {
      verbose = true;
      continue;
    }
    if (token.startsWith("-")) {
      throw new Error(`CONFIGURATION_ERROR unknown option "${token}"`);
    }
    positional.push(token);
  }

  const envPort = nonEmpty(env[REVIEW_ENV_KEYS.PORT]);
  const port = portFromFlag ?? (envPort !== undefined ? parsePort(envPort, REVIEW_ENV_KEYS.PORT) : 0);
  const base = {
    port,
    outputDir: outputFromFlag ?? nonEmpty(env[REVIEW_ENV_KEYS.OUTPUT_DIR]),
    openBrowser: !noOpen && !isTruthyFlag(env[REVIEW_ENV_KEYS.NO_OPEN]),
    debounceMs,
    verbose,
    uiDistDir: nonEmpty(env[REVIEW_ENV_KEYS.UI_DIST_DIR]),
  };

  if (wantsHelp || positional[0] === "help") {
    return { ...base, command: "help" };
  }
  if (wantsVersion) {
    return { ...base, command: "version" };
  }

  const filePath = positional[0];
  if (filePath === undefined) {
    throw new Error("CONFIGURATION_ERROR a file to review is required");
  }
  if (positional.length > 1) {
    throw new Error(`CONFIGURATION_ERROR expected one file, got ${String(positional.length)}`);
  }
  return { ...base, command: "review", filePath };
}
