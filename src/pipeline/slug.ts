import path from "node:path";

export function cleanText(text: string | undefined | null): string {
  if (!text) {
    return "";
  }
  return text.replace(/\r/g, "").replace(/\n/g, " ").trim();
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function slugifyFilename(filename: string): string {
  const ext = path.extname(filename);
  const base = slugify(filename.slice(0, filename.length - ext.length)) || "file";
  return `${base}${ext.toLowerCase()}`;
}

// Keeps free text safe to embed in hand-edited JSON manifests.
export function sanitizeForJson(text: string | undefined | null): string {
  if (!text) {
    return "";
  }
  return text.replace(/\\/g, "/").replace(/"/g, "'");
}
