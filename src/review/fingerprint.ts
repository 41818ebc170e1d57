import crypto from "node:crypto";

export const FINGERPRINT_PREFIX = "sha256:";

export function computeContentFingerprint(data: Buffer | string): string {
  const digest = crypto.createHash("sha256").update(data).digest("hex");
  return `${FINGERPRINT_PREFIX}${digest}`;
}
