import { z } from "zod";

export const PAPER_COLUMNS = [
  "title",
  "authors",
  "journal",
  "publish_time",
  "publication_year",
  "abstract",
  "title_word_count",
  "abstract_word_count",
] as const;

export const REQUIRED_COLUMNS = ["title", "journal", "abstract"] as const;

export const DEFAULT_PUBLICATION_YEAR = 2020;

export const PaperColumnSchema = z.enum(PAPER_COLUMNS);
export type PaperColumn = z.infer<typeof PaperColumnSchema>;

export const PaperSchema = z.object({
  title: z.string().nullable(),
  authors: z.string().nullable().optional(),
  journal: z.string().nullable(),
  publish_time: z.string().nullable().optional(),
  publication_year: z.number().int(),
  abstract: z.string().nullable(),
  title_word_count: z.number(),
  abstract_word_count: z.number(),
});
export type Paper = z.infer<typeof PaperSchema>;

export const PaperDatasetSchema = z.object({
  columns: z.array(PaperColumnSchema),
  records: z.array(PaperSchema),
});
export type PaperDataset = z.infer<typeof PaperDatasetSchema>;

export const NoticeSchema = z.object({
  level: z.enum(["info", "success", "warning", "error"]),
  message: z.string(),
});
export type Notice = z.infer<typeof NoticeSchema>;
export type NoticeLevel = Notice["level"];

export const LoadFailureReasonSchema = z.enum(["not_found", "empty", "missing_column", "unexpected"]);
export type LoadFailureReason = z.infer<typeof LoadFailureReasonSchema>;

export const DatasetLoadResultSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("loaded"),
    dataset: PaperDatasetSchema,
    source: z.string(),
    notices: z.array(NoticeSchema),
  }),
  z.object({
    status: z.literal("fallback"),
    dataset: PaperDatasetSchema,
    reason: LoadFailureReasonSchema,
    message: z.string(),
    notices: z.array(NoticeSchema),
  }),
]);
export type DatasetLoadResult = z.infer<typeof DatasetLoadResultSchema>;

export const ExplorerSettingsSchema = z.object({
  previewRows: z.number().int().positive().default(20),
  topJournals: z.number().int().positive().default(10),
  wordCloud: z
    .object({
      width: z.number().int().positive().default(600),
      height: z.number().int().positive().default(400),
      maxWords: z.number().int().positive().default(200),
    })
    .default({}),
});
export type ExplorerSettings = z.infer<typeof ExplorerSettingsSchema>;

export const DEFAULT_SETTINGS: ExplorerSettings = ExplorerSettingsSchema.parse({});

export const DatasetResponseSchema = z.object({
  result: DatasetLoadResultSchema,
  settings: ExplorerSettingsSchema,
});
export type DatasetResponse = z.infer<typeof DatasetResponseSchema>;

export const isDemoResult = (result: DatasetLoadResult) => result.status === "fallback";
