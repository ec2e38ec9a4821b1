/**
 * Zod schemas for persisted artifacts and stage triggers.
 *
 * Everything read back from object storage or received from the invoking
 * host is validated against one of these before use.
 */

import { z } from "zod/v4";

// ============================================================================
// Documents
// ============================================================================

export const documentTypeSchema = z.enum(["pdf", "docx", "pptx", "xlsx"]);

export type DocumentType = z.infer<typeof documentTypeSchema>;

export const manifestSchema = z.object({
  documentId: z.string().min(1),
  pages: z.number().int().min(1),
  type: documentTypeSchema.optional(),
});

export type Manifest = z.infer<typeof manifestSchema>;

export const mergedDocumentSchema = z.object({
  documentId: z.string().min(1),
  type: documentTypeSchema,
  pageCount: z.number().int().min(1),
  pages: z.array(z.unknown()),
});

export type MergedDocument = z.infer<typeof mergedDocumentSchema>;

// ============================================================================
// Office content blocks
// ============================================================================

export const paragraphBlockSchema = z.object({
  type: z.literal("paragraph"),
  text: z.string(),
  format: z.object({ style: z.string().nullable() }),
});

export const tableBlockSchema = z.object({
  type: z.literal("table"),
  rows: z.array(z.array(z.string())),
});

export const slideBlockSchema = z.object({
  type: z.literal("slide"),
  slide: z.number().int().min(1),
  text: z.string(),
});

export const sheetBlockSchema = z.object({
  type: z.literal("sheet"),
  name: z.string(),
  rows: z.array(z.array(z.string())),
});

export const officeBlockSchema = z.discriminatedUnion("type", [
  paragraphBlockSchema,
  tableBlockSchema,
  slideBlockSchema,
  sheetBlockSchema,
]);

export type ParagraphBlock = z.infer<typeof paragraphBlockSchema>;
export type TableBlock = z.infer<typeof tableBlockSchema>;
export type SlideBlock = z.infer<typeof slideBlockSchema>;
export type SheetBlock = z.infer<typeof sheetBlockSchema>;
export type OfficeBlock = z.infer<typeof officeBlockSchema>;

// ============================================================================
// Triggers
// ============================================================================

export const triggerRecordSchema = z.object({
  bucket: z.string().min(1),
  key: z.string().min(1),
});

export const stageTriggerSchema = z.object({
  records: z.array(triggerRecordSchema),
});

export type TriggerRecord = z.infer<typeof triggerRecordSchema>;
export type StageTrigger = z.infer<typeof stageTriggerSchema>;

/** The subset of an S3 "object created" notification the stages read. */
export const s3EventSchema = z.object({
  Records: z
    .array(
      z.object({
        s3: z.object({
          bucket: z.object({ name: z.string() }),
          object: z.object({ key: z.string() }),
        }),
      })
    )
    .default([]),
});

export type S3Event = z.input<typeof s3EventSchema>;
