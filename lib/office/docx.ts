/**
 * Word documents become a single page of paragraph and table blocks, in
 * body order. Empty paragraphs are dropped.
 */

import type { OfficeBlock, ParagraphBlock, TableBlock } from "../pipeline/core/schemas.js";
import { openArchive, readXmlPart, requireXmlPart } from "./archive.js";
import {
  attributeOf,
  childElements,
  childrenOf,
  descendants,
  firstChild,
  nameOf,
  textOf,
  type XmlNode,
} from "./xml.js";

interface StyleTable {
  names: Map<string, string>;
  defaultParagraph: string | null;
}

export async function parseDocx(bytes: Buffer, documentId: string): Promise<OfficeBlock[][]> {
  const zip = await openArchive(bytes, documentId);
  const document = await requireXmlPart(zip, "word/document.xml", documentId);
  const styles = readStyles(await readXmlPart(zip, "word/styles.xml"));

  const [body] = descendants(document, "w:body");
  const blocks: OfficeBlock[] = body ? readBody(childrenOf(body), styles) : [];
  return [blocks];
}

function readBody(nodes: XmlNode[], styles: StyleTable): OfficeBlock[] {
  const blocks: OfficeBlock[] = [];
  for (const node of nodes) {
    switch (nameOf(node)) {
      case "w:p": {
        const paragraph = readParagraph(node, styles);
        if (paragraph.text.trim()) blocks.push(paragraph);
        break;
      }
      case "w:tbl":
        blocks.push(readTable(node));
        break;
      case "w:sdt": {
        const content = firstChild(node, "w:sdtContent");
        if (content) blocks.push(...readBody(childrenOf(content), styles));
        break;
      }
    }
  }
  return blocks;
}

function readParagraph(node: XmlNode, styles: StyleTable): ParagraphBlock {
  const properties = firstChild(node, "w:pPr");
  const styleRef = properties ? firstChild(properties, "w:pStyle") : undefined;
  const styleId = styleRef ? attributeOf(styleRef, "w:val") : undefined;
  const style = styleId === undefined ? styles.defaultParagraph : (styles.names.get(styleId) ?? styleId);
  return { type: "paragraph", text: runText(childrenOf(node)), format: { style } };
}

function readTable(node: XmlNode): TableBlock {
  const rows = childElements(node, "w:tr").map((row) =>
    childElements(row, "w:tc").map((cell) =>
      childElements(cell, "w:p")
        .map((p) => runText(childrenOf(p)))
        .join("\n")
    )
  );
  return { type: "table", rows };
}

function runText(nodes: XmlNode[]): string {
  let text = "";
  for (const node of nodes) {
    switch (nameOf(node)) {
      case "w:t":
        text += textOf(node);
        break;
      case "w:tab":
        text += "\t";
        break;
      case "w:br":
      case "w:cr":
        text += "\n";
        break;
      // Properties hold tab stop definitions, not text
      case "w:pPr":
      case "w:rPr":
        break;
      default:
        text += runText(childrenOf(node));
    }
  }
  return text;
}

function readStyles(part: XmlNode[] | undefined): StyleTable {
  const table: StyleTable = { names: new Map(), defaultParagraph: null };
  if (!part) return table;
  for (const style of descendants(part, "w:style")) {
    const id = attributeOf(style, "w:styleId");
    const nameNode = firstChild(style, "w:name");
    const name = nameNode ? attributeOf(nameNode, "w:val") : undefined;
    if (!id || !name) continue;
    table.names.set(id, name);
    const isDefault = attributeOf(style, "w:default");
    if (attributeOf(style, "w:type") === "paragraph" && (isDefault === "1" || isDefault === "true")) {
      table.defaultParagraph = name;
    }
  }
  return table;
}
