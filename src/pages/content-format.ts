/**
 * Content format detection and conversion to HTML.
 *
 * Page content may arrive as HTML, Markdown or plain text. Everything sent
 * to the page API must be HTML, so each piece of content is classified and
 * converted before resource rewriting:
 *
 *   - HTML: any tag is present. Passed through untouched.
 *   - Markdown: some line starts with a block marker (heading, list item,
 *     blockquote, code fence, rule, table row). Rendered with markdown-it.
 *   - Text: everything else. Escaped, blank lines dropped, remaining lines
 *     joined with <br> inside one paragraph.
 */

import MarkdownIt from "markdown-it";

export type ContentFormat = "html" | "markdown" | "text";

export interface ConvertedContent {
  html: string;
  format: ContentFormat;
}

const HTML_TAG = /<\/?[a-zA-Z][^>]*>/;

const MARKDOWN_LINE_PATTERNS: readonly RegExp[] = [
  /^#{1,6}\s/, // headings
  /^[-*+]\s/, // bullet lists
  /^\d+\.\s/, // ordered lists
  /^>\s/, // blockquotes
  /^```|^~~~/, // code fences
  /^(---+|\*\*\*+|___+)$/, // horizontal rules
  /^\|.*\|/, // tables
];

let markdown: MarkdownIt | null = null;

function getMarkdownIt(): MarkdownIt {
  if (!markdown) {
    const md = new MarkdownIt({
      html: false,
      linkify: true,
      breaks: false,
      typographer: false,
    });
    md.enable(["table", "strikethrough"]);
    markdown = md;
  }
  return markdown;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function hasMarkdownSyntax(content: string): boolean {
  return content
    .split("\n")
    .map((line) => line.trim())
    .some((line) => line !== "" && MARKDOWN_LINE_PATTERNS.some((pattern) => pattern.test(line)));
}

export function detectContentFormat(content: string): ContentFormat {
  const trimmed = content.trim();
  if (!trimmed) return "text";
  if (HTML_TAG.test(trimmed)) return "html";
  if (hasMarkdownSyntax(trimmed)) return "markdown";
  return "text";
}

export function textToHtml(text: string): string {
  const lines = escapeHtml(text)
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");
  return `<p>${lines.join("<br>")}</p>`;
}

export function markdownToHtml(source: string): string {
  return getMarkdownIt().render(source);
}

export function convertToHtml(content: string): ConvertedContent {
  const format = detectContentFormat(content);
  switch (format) {
    case "html":
      return { html: content, format };
    case "markdown":
      return { html: markdownToHtml(content), format };
    case "text":
      return { html: textToHtml(content), format };
  }
}
