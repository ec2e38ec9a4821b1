/**
 * Office stage
 *
 * office-docs/<file>.{docx,pptx,xlsx} -> text-pages/<id>/page_NNN.json,
 * the manifest, and the merged document. Every page output exists before
 * the manifest is written, so the document is combined in the same call.
 */

import { MalformedSourceError } from "../../errors.js";
import { officeTypeOf } from "../../office/index.js";
import { requireObject } from "../../storage/types.js";
import type { CombineAssembler } from "../combine.js";
import { ManifestTracker } from "../manifest.js";
import {
  extractOfficeDocument,
  officePageOutput,
  type OfficeParser,
} from "../steps/extract-office.js";
import { documentIdFromKey, extensionOf, resolveDocumentKeys } from "../types.js";
import type { Stage, StageContext } from "./types.js";

export interface OfficeStageOptions {
  assembler: CombineAssembler;
  parse?: OfficeParser;
}

export function createOfficeStage(ctx: StageContext, options: OfficeStageOptions): Stage {
  const { store, prefixes, progress } = ctx;
  const { assembler, parse } = options;
  const manifests = new ManifestTracker(store, prefixes);

  return {
    name: "office",
    prefix: prefixes.office,
    async handle({ key }) {
      const type = officeTypeOf(extensionOf(key));
      if (!type) {
        return `unsupported office type .${extensionOf(key)}`;
      }

      const documentId = documentIdFromKey(key);
      const bytes = await requireObject(store, key);
      const extraction = await extractOfficeDocument({ documentId, type, bytes }, parse);
      if (extraction.pages.length === 0) {
        throw new MalformedSourceError(`${key} has no pages`, documentId);
      }

      const keys = resolveDocumentKeys(documentId, prefixes);
      for (const [i, blocks] of extraction.pages.entries()) {
        const target = keys.pageOutput(i + 1, "json");
        await store.put(target, JSON.stringify(officePageOutput(blocks).content), "application/json");
        progress.emit({ type: "write", stage: "office", key: target });
      }

      const manifestKey = await manifests.write(documentId, extraction.pages.length, type);
      progress.emit({ type: "write", stage: "office", key: manifestKey });

      const result = await assembler.assemble(documentId);
      return result.outcome === "merged"
        ? `${extraction.pages.length} pages merged`
        : `${extraction.pages.length} pages, ${result.outcome}`;
    },
  };
}
