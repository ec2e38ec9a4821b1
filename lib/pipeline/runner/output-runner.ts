/**
 * Output stage
 *
 * text-docs/<id>.json -> POST to the configured API.
 */

import { MalformedSourceError, errorMessage } from "../../errors.js";
import { requireObject } from "../../storage/types.js";
import { mergedDocumentSchema } from "../core/schemas.js";
import type { OutputDispatcher } from "../output.js";
import { documentIdFromKey, extensionOf } from "../types.js";
import type { Stage, StageContext } from "./types.js";

export function createOutputStage(ctx: StageContext, dispatcher: OutputDispatcher): Stage {
  const { store, prefixes } = ctx;

  return {
    name: "output",
    prefix: prefixes.textDocs,
    async handle({ key }) {
      const relative = key.slice(prefixes.textDocs.length);
      if (relative.includes("/") || extensionOf(key) !== "json") {
        return "not a merged document";
      }

      const documentId = documentIdFromKey(key);
      const body = await requireObject(store, key);
      let raw: unknown;
      try {
        raw = JSON.parse(body.toString("utf-8"));
      } catch (err) {
        throw new MalformedSourceError(`${key} is not valid JSON: ${errorMessage(err)}`, documentId, {
          cause: err,
        });
      }
      const parsed = mergedDocumentSchema.safeParse(raw);
      if (!parsed.success) {
        throw new MalformedSourceError(`${key} is not a merged document`, documentId);
      }

      const status = await dispatcher.dispatch(parsed.data);
      return `sent ${documentId} (HTTP ${status})`;
    },
  };
}
