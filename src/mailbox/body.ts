import { load } from "cheerio";

export function htmlToText(html: string): string {
  const $ = load(html);
  $("script, style, head").remove();
  $("br").replaceWith("\n");
  $("p, div, li, tr, h1, h2, h3, h4, h5, h6").each((_, element) => {
    $(element).append("\n");
  });

  return $.root()
    .text()
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function bodyText(message: { textBody?: string; htmlBody?: string }): string {
  if (message.textBody && message.textBody.trim().length > 0) {
    return message.textBody;
  }
  return message.htmlBody ? htmlToText(message.htmlBody) : "";
}
