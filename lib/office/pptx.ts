/**
 * PowerPoint decks become one page per slide, in presentation order. A
 * slide's text is the text of each shape, joined by newlines.
 */

import path from "node:path/posix";
import type JSZip from "jszip";
import type { OfficeBlock } from "../pipeline/core/schemas.js";
import { openArchive, readXmlPart, requireXmlPart } from "./archive.js";
import { attributeOf, childrenOf, descendants, textOf, type XmlNode } from "./xml.js";

export async function parsePptx(bytes: Buffer, documentId: string): Promise<OfficeBlock[][]> {
  const zip = await openArchive(bytes, documentId);
  const slidePaths = await slideOrder(zip);

  const pages: OfficeBlock[][] = [];
  for (const [i, slidePath] of slidePaths.entries()) {
    const slide = await requireXmlPart(zip, slidePath, documentId);
    pages.push([{ type: "slide", slide: i + 1, text: slideText(slide) }]);
  }
  return pages;
}

function slideText(slide: XmlNode[]): string {
  const texts: string[] = [];
  for (const shape of descendants(slide, "p:sp")) {
    const paragraphs = descendants(childrenOf(shape), "a:p").map(paragraphText);
    const text = paragraphs.join("\n");
    if (text.trim()) texts.push(text);
  }
  return texts.join("\n");
}

function paragraphText(paragraph: XmlNode): string {
  let text = "";
  for (const node of descendants(childrenOf(paragraph), "a:t")) {
    text += textOf(node);
  }
  return text;
}

/**
 * Slide part paths in the order of the presentation's slide list. Falls
 * back to numeric file order when the presentation part is missing.
 */
async function slideOrder(zip: JSZip): Promise<string[]> {
  const presentation = await readXmlPart(zip, "ppt/presentation.xml");
  const rels = await readXmlPart(zip, "ppt/_rels/presentation.xml.rels");
  if (presentation && rels) {
    const targets = new Map<string, string>();
    for (const rel of descendants(rels, "Relationship")) {
      const id = attributeOf(rel, "Id");
      const target = attributeOf(rel, "Target");
      if (id && target) targets.set(id, target);
    }
    const ordered: string[] = [];
    for (const slideId of descendants(presentation, "p:sldId")) {
      const target = targets.get(attributeOf(slideId, "r:id") ?? "");
      if (!target) continue;
      ordered.push(target.startsWith("/") ? target.slice(1) : path.join("ppt", target));
    }
    if (ordered.length > 0) return ordered;
  }

  return Object.keys(zip.files)
    .filter((name) => /^ppt\/slides\/slide\d+\.xml$/.test(name))
    .sort((a, b) => slideNumber(a) - slideNumber(b));
}

function slideNumber(name: string): number {
  const match = /slide(\d+)\.xml$/.exec(name);
  return match ? Number(match[1]) : 0;
}
