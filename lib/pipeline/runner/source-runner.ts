/**
 * Source Router
 *
 * Entry stage for uploads under the raw prefix. PDFs and office files are
 * copied to their own prefixes, which triggers the matching path.
 */

import { officeTypeOf } from "../../office/index.js";
import { contentTypeForKey, requireObject } from "../../storage/types.js";
import { extensionOf } from "../types.js";
import type { Stage, StageContext } from "./types.js";

export function createRouterStage(ctx: StageContext): Stage {
  const { store, prefixes, progress } = ctx;

  return {
    name: "router",
    prefix: prefixes.raw,
    async handle({ key }) {
      const relative = key.slice(prefixes.raw.length);
      const extension = extensionOf(key);

      let target: string;
      if (extension === "pdf") {
        target = `${prefixes.pdfRaw}${relative}`;
      } else if (officeTypeOf(extension)) {
        target = `${prefixes.office}${relative}`;
      } else {
        return `no route for .${extension || "(none)"}`;
      }

      const body = await requireObject(store, key);
      await store.put(target, body, contentTypeForKey(target));
      progress.emit({ type: "write", stage: "router", key: target });
      return `routed to ${target}`;
    },
  };
}
