import fs from "node:fs";
import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import type { Server } from "node:http";
import { startWebServer } from "../../src/adapters/web";
import { ReviewSession } from "../../src/review";
import { watchSourceFile } from "../fs/source_watcher";
import { openBrowser } from "./open_browser";
import { parseReviewArgs, USAGE, type ReviewCliArgs } from "./review.args";

const SERVER_CLOSE_TIMEOUT_MS = 2000;
const PACKAGE_JSON_PATH = fileURLToPath(new URL("../../package.json", import.meta.url));
const BUNDLED_UI_DIST_DIR = fileURLToPath(new URL("../../dist/ui", import.meta.url));

function readVersion(): string {
  try {
    const parsed = JSON.parse(fs.readFileSync(PACKAGE_JSON_PATH, "utf8")) as unknown;
    if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
      const { version } = parsed;
      if (typeof version === "string") {
        return version;
      }
    }
  } catch (error) {
    console.warn(
      `[cli] could not read version: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return "dev";
}

function resolveSourcePath(filePath: string): string {
  const absPath = path.resolve(filePath);
  let stat: fs.Stats;
  try {
    stat = fs.statSync(absPath);
  } catch (error) {
    throw new Error(
      `REVIEW_SOURCE_READ_ERROR ${absPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (stat.isDirectory()) {
    throw new Error(`REVIEW_SOURCE_READ_ERROR ${absPath} is a directory, not a file`);
  }
  return absPath;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    const forceTimer = setTimeout(() => {
      server.closeAllConnections();
    }, SERVER_CLOSE_TIMEOUT_MS);
    server.close(() => {
      clearTimeout(forceTimer);
      resolve();
    });
    server.closeIdleConnections();
  });
}

function waitForShutdownSignal(register: (trigger: (reason: string) => void) => void): Promise<string> {
  return new Promise((resolve) => {
    let settled = false;
    const trigger = (reason: string) => {
      if (settled) {
        return;
      }
      settled = true;
      process.off("SIGINT", onSigint);
      process.off("SIGTERM", onSigterm);
      resolve(reason);
    };
    const onSigint = () => trigger("SIGINT");
    const onSigterm = () => trigger("SIGTERM");
    process.on("SIGINT", onSigint);
    process.on("SIGTERM", onSigterm);
    register(trigger);
  });
}

async function runReview(args: ReviewCliArgs & { readonly filePath: string }): Promise<number> {
  const sourcePath = resolveSourcePath(args.filePath);
  const session = ReviewSession.open({
    sourcePath,
    outputDir: args.outputDir,
    engine: { debounceMs: args.debounceMs, verbose: args.verbose },
  });

  const staleNotice = session.getStaleNotice();
  if (staleNotice !== "") {
    console.warn(`[review] ${staleNotice}`);
  }

  let requestShutdown: (reason: string) => void = () => undefined;
  const shutdownRequested = waitForShutdownSignal((trigger) => {
    requestShutdown = trigger;
  });

  const { server, url } = await startWebServer({
    session,
    port: args.port,
    uiDistDir: args.uiDistDir ?? BUNDLED_UI_DIST_DIR,
    onFinish: () => requestShutdown("finish"),
  });
  if (args.openBrowser) {
    openBrowser(url);
  }
  const stopWatching = watchSourceFile(sourcePath, () => session.noteSourceChanged());

  const reason = await shutdownRequested;
  console.log(`\n[cli] shutting down (${reason})`);
  stopWatching();

  // stop accepting requests first; any that still slip in get SESSION_CLOSED
  const serverClosed = closeServer(server);
  const outcome = await session.shutdown();
  if (outcome.commentCount > 0 && outcome.errors.length === 0) {
    console.log(`[cli] review written to ${session.reviewFilePath}`);
  }
  if (session.sourceChangedOnDisk) {
    console.log(
      `[cli] ${session.getDocument().fileName} changed during this session; the next run starts with a stale notice`
    );
  }
  await serverClosed;
  return outcome.errors.length === 0 ? 0 : 1;
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let args: ReviewCliArgs;
  try {
    args = parseReviewArgs(argv);
  } catch (error) {
    console.error(`[cli] ${error instanceof Error ? error.message : String(error)}\n`);
    console.error(USAGE);
    return 1;
  }

  if (args.command === "help") {
    console.log(USAGE);
    return 0;
  }
  if (args.command === "version") {
    console.log(`line-review ${readVersion()}`);
    return 0;
  }

  const { filePath } = args;
  if (filePath === undefined) {
    console.error(USAGE);
    return 1;
  }

  try {
    return await runReview({ ...args, filePath });
  } catch (error) {
    console.error(`[cli] ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

function isEntrypoint(): boolean {
  const scriptPath = process.argv[1];
  if (typeof scriptPath !== "string" || scriptPath.trim() === "") {
    return false;
  }
  return import.meta.url === pathToFileURL(path.resolve(scriptPath)).href;
}

if (isEntrypoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`[cli] ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  );
}
