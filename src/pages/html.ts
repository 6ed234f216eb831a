/**
 * Page HTML parsing via linkedom.
 *
 * Update commands carry fragments ("<p>..</p><img ..>") while page content
 * comes back as a full document. Fragments are parsed inside a private
 * body and rendered back as that body's inner HTML, so no wrapper leaks
 * into the output.
 */

import { parseHTML } from "linkedom";

/** The element surface the resource code reads and rewrites. */
export interface ResourceElement {
  readonly tagName: string;
  readonly attributes: ArrayLike<{ readonly name: string; readonly value: string }>;
  getAttribute(name: string): string | null;
  setAttribute(name: string, value: string): void;
  removeAttribute(name: string): void;
}

export interface ParsedPage {
  /** img[src] and object[data] elements, in document order. */
  resourceElements(): ResourceElement[];
  render(): string;
}

export type ResourceTag = "img" | "object";

export function isFullDocument(html: string): boolean {
  return /<html[\s>]/i.test(html);
}

export function parsePageHtml(html: string): ParsedPage {
  const full = isFullDocument(html);
  const { document } = parseHTML(full ? html : `<!doctype html><html><head></head><body>${html}</body></html>`);

  return {
    resourceElements() {
      return Array.from(document.querySelectorAll("img[src], object[data]"));
    },
    render() {
      return full ? document.toString() : document.body.innerHTML;
    },
  };
}

export function resourceTag(element: ResourceElement): ResourceTag | null {
  const tag = element.tagName.toLowerCase();
  return tag === "img" || tag === "object" ? tag : null;
}

/** The attribute holding the resource URL: src for img, data for object. */
export function urlAttribute(tag: ResourceTag): "src" | "data" {
  return tag === "img" ? "src" : "data";
}

export function attributeMap(element: ResourceElement): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const attr of Array.from(element.attributes)) {
    attrs[attr.name] = attr.value;
  }
  return attrs;
}
