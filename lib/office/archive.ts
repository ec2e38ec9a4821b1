import JSZip from "jszip";
import { MalformedSourceError, errorMessage } from "../errors.js";
import { parseXml, type XmlNode } from "./xml.js";

export async function openArchive(bytes: Buffer, documentId: string): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(bytes);
  } catch (err) {
    throw new MalformedSourceError(
      `${documentId}: not a readable OOXML package: ${errorMessage(err)}`,
      documentId,
      { cause: err }
    );
  }
}

/** Parse one XML part; `undefined` when the part is absent. */
export async function readXmlPart(zip: JSZip, path: string): Promise<XmlNode[] | undefined> {
  const file = zip.file(path);
  if (!file) return undefined;
  return parseXml(await file.async("string"));
}

export async function requireXmlPart(
  zip: JSZip,
  path: string,
  documentId: string
): Promise<XmlNode[]> {
  const part = await readXmlPart(zip, path);
  if (!part) {
    throw new MalformedSourceError(`${documentId}: missing ${path}`, documentId);
  }
  return part;
}
