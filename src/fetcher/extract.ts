// src/fetcher/extract.ts
import { JSDOM, VirtualConsole } from "jsdom";
import { createMetadata, type Metadata } from "./types";

// --- helpers ---
function firstAttr(doc: Document, selector: string, attr: string): string | null {
  return doc.querySelector(selector)?.getAttribute(attr) ?? null;
}

function ogContent(doc: Document, property: string): string | null {
  return firstAttr(doc, `[property="${property}"]`, "content");
}
// --- end helpers ---

/**
 * Title, description and image of an HTML document.
 *
 * Each field takes the first Open Graph tag for it, falling back to the standard
 * HTML tag only when that OG tag (or its content attribute) is missing:
 * - title: og:title, then the text of the first <title>
 * - description: og:description, then <meta name="description">
 * - image: og:image only
 *
 * Never throws; markup the parser cannot handle yields empty metadata.
 */
export function extractMetadata(html: string): Metadata {
  let dom: JSDOM;
  try {
    // a bare VirtualConsole drops jsdom's own parse warnings
    dom = new JSDOM(html, { virtualConsole: new VirtualConsole() });
  } catch {
    return createMetadata();
  }

  try {
    const doc = dom.window.document;

    const title = ogContent(doc, "og:title") ?? doc.querySelector("title")?.textContent ?? null;

    const description =
      ogContent(doc, "og:description") ?? firstAttr(doc, '[name="description"]', "content");

    const image = ogContent(doc, "og:image");

    return createMetadata({ title, description, image });
  } finally {
    dom.window.close();
  }
}
