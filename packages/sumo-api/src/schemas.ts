import { z } from "zod";

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const SearchJobSchema = z.object({
  id: z.string().min(1),
});

export const SearchJobStatusSchema = z.object({
  state: z.string(),
  messageCount: z.number().int().nonnegative(),
  recordCount: z.number().int().nonnegative(),
  pendingErrors: z.array(z.string()).default([]),
  pendingWarnings: z.array(z.string()).default([]),
});

export const FieldSchema = z.object({
  name: z.string(),
  fieldType: z.string(),
  keyField: z.boolean().default(false),
});

const RowSchema = z.object({
  map: z.record(z.string(), CellSchema),
});

export const RecordsPageSchema = z.object({
  fields: z.array(FieldSchema),
  records: z.array(RowSchema),
});

export const MessagesPageSchema = z.object({
  fields: z.array(FieldSchema),
  messages: z.array(RowSchema),
});

export type Cell = z.infer<typeof CellSchema>;
export type SearchJob = z.infer<typeof SearchJobSchema>;
export type SearchJobStatus = z.infer<typeof SearchJobStatusSchema>;
export type Field = z.infer<typeof FieldSchema>;
export type ResultRow = z.infer<typeof RowSchema>;
export type RecordsPage = z.infer<typeof RecordsPageSchema>;
export type MessagesPage = z.infer<typeof MessagesPageSchema>;
