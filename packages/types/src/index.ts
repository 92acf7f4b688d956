// Zod schemas and inferred types
export * from './schemas/index.js';

// Pure utils (constants, dates, control numbers)
export * from './utils/index.js';

// Section-name configuration
export { DEFAULT_SECTION_NAMES, resolveSectionName, loadSectionNames } from './config/section-names.js';

// Progress events
export type { ConversionEvent, ProgressCallback } from './events/index.js';
