/**
 * Combine stage
 *
 * Triggered by every page output. Re-checks the whole document and merges
 * it when the last page has arrived.
 */

import type { CombineAssembler } from "../combine.js";
import { PAGE_OUTPUT_EXTENSIONS, parsePageKey } from "../types.js";
import type { Stage, StageContext } from "./types.js";

function isOutputExtension(extension: string): boolean {
  return PAGE_OUTPUT_EXTENSIONS.some((ext) => ext === extension);
}

export function createCombineStage(ctx: StageContext, assembler: CombineAssembler): Stage {
  const { prefixes } = ctx;

  return {
    name: "combine",
    prefix: prefixes.textPages,
    async handle({ key }) {
      const page = parsePageKey(key, prefixes.textPages);
      if (!page || !isOutputExtension(page.extension)) {
        return "not a page output";
      }

      const result = await assembler.assemble(page.documentId);
      switch (result.outcome) {
        case "no-manifest":
          return `no manifest for ${result.documentId} yet`;
        case "waiting":
          return `waiting for page ${result.pageIndex} of ${result.pageCount}`;
        case "merged":
          return `merged ${result.document.pageCount} pages into ${result.key}`;
      }
    },
  };
}
