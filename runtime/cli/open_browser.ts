import { spawn } from "node:child_process";

export function browserCommandFor(platform: NodeJS.Platform): string | null {
  if (platform === "darwin") {
    return "open";
  }
  if (platform === "linux" || platform === "freebsd" || platform === "openbsd") {
    return "xdg-open";
  }
  return null;
}

export function openBrowser(url: string, platform: NodeJS.Platform = process.platform): void {
  const command = browserCommandFor(platform);
  if (command === null) {
    return;
  }
  const child = spawn(command, [url], { stdio: "ignore", detached: true });
  child.on("error", (error) => {
    console.warn(`[cli] could not open browser (${command}): ${error.message}`);
  });
  child.unref();
}
