// Benchmark parser
export { parseBenchmark, type ParseBenchmarkOptions } from './cis/index.js';
export { detectBenchmarkMetadata } from './cis/metadata.js';
export { findRecommendationsStartPage } from './cis/start-page.js';
export {
  findRecommendationHeaders,
  parseRecommendationDetails,
  isAcceptedRecommendation,
  extractRecommendations,
  type RecommendationExtraction,
} from './cis/recommendation-parser.js';
export type { RecommendationHeader } from './cis/types.js';

// Normalizers
export {
  deduplicateRecommendations,
  sortRecommendations,
  groupBySection,
} from './normalizers/index.js';
