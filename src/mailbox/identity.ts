import crypto from "node:crypto";

export function normalizeMessageId(raw: string | undefined | null): string | undefined {
  if (!raw) {
    return undefined;
  }
  const trimmed = raw.trim().replace(/^<+/, "").replace(/>+$/, "").trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function deriveMessageId(parts: { from: string; subject: string; date?: Date; attachmentNames: string[] }): string {
  const digest = crypto
    .createHash("sha256")
    .update(
      [parts.from.trim().toLowerCase(), parts.subject.trim(), parts.date?.toISOString() ?? "", ...parts.attachmentNames].join("\n"),
    )
    .digest("hex")
    .slice(0, 32);
  return `sha256:${digest}`;
}
