import { z } from 'zod';

export const RecommendationStatusSchema = z.enum(['Automated', 'Manual', 'Scored', 'Not Scored']);
export type RecommendationStatus = z.infer<typeof RecommendationStatusSchema>;

export const ControlNumberSchema = z
  .string()
  .regex(/^\d+(?:\.\d+)+$/, 'Control number must be dotted integers (e.g. 1.1.2)');

export const RecommendationSchema = z.object({
  num: ControlNumberSchema,
  title: z.string().min(1),
  profile: z.string().min(1),
  status: RecommendationStatusSchema,
  description: z.string().max(1500),
  rationale: z.string().max(1000),
  impact: z.string().max(1000),
  audit: z.string().min(1).max(2500),
  remediation: z.string().max(1500),
  defaultValue: z.string().max(500),
  references: z.string().max(800),
});
export type Recommendation = z.infer<typeof RecommendationSchema>;

export const BenchmarkMetadataSchema = z.object({
  title: z.string(),
  version: z.string(),
});
export type BenchmarkMetadata = z.infer<typeof BenchmarkMetadataSchema>;

export const RecommendationSectionSchema = z.object({
  number: z.string().regex(/^\d+$/),
  recommendations: z.array(RecommendationSchema),
});
export type RecommendationSection = z.infer<typeof RecommendationSectionSchema>;

export const StartPageResultSchema = z.object({
  /** 0-based page index */
  pageIndex: z.number().int().nonnegative(),
  detected: z.boolean(),
});
export type StartPageResult = z.infer<typeof StartPageResultSchema>;

export const BenchmarkParseResultSchema = z.object({
  metadata: BenchmarkMetadataSchema,
  startPage: StartPageResultSchema,
  pagesScanned: z.number().int().nonnegative(),
  headersMatched: z.number().int().nonnegative(),
  recommendations: z.array(RecommendationSchema),
  sections: z.array(RecommendationSectionSchema),
  warnings: z.array(z.string()),
});
export type BenchmarkParseResult = z.infer<typeof BenchmarkParseResultSchema>;

export const ExtractorOptionsSchema = z.object({
  metadataPages: z.number().int().positive().default(5),
  startPageScanLimit: z.number().int().positive().default(30),
  fallbackStartPage: z.number().int().nonnegative().default(15),
  contentWindowLength: z.number().int().positive().default(3500),
});
export type ExtractorOptions = z.infer<typeof ExtractorOptionsSchema>;
export type ExtractorOptionsInput = z.input<typeof ExtractorOptionsSchema>;

export const SectionNamesSchema = z.record(
  z.string().regex(/^\d+$/, 'Section keys must be integers'),
  z.string().min(1)
);
export type SectionNames = Readonly<Record<string, string>>;
