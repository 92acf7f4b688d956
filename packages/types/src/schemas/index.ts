export {
  RecommendationStatusSchema,
  ControlNumberSchema,
  RecommendationSchema,
  BenchmarkMetadataSchema,
  RecommendationSectionSchema,
  StartPageResultSchema,
  BenchmarkParseResultSchema,
  ExtractorOptionsSchema,
  SectionNamesSchema,
} from './recommendation.js';

export type {
  RecommendationStatus,
  Recommendation,
  BenchmarkMetadata,
  RecommendationSection,
  StartPageResult,
  BenchmarkParseResult,
  ExtractorOptions,
  ExtractorOptionsInput,
  SectionNames,
} from './recommendation.js';
