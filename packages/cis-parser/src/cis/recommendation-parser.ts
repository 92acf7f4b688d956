import { extractTextBetweenMarkers, type ExtractedPDF } from '@cisbench/pdf-extract';
import {
  DEFAULT_PROFILE,
  FIELD_LIMITS,
  RecommendationStatusSchema,
  type LimitedField,
  type Recommendation,
} from '@cisbench/types';
import type { RecommendationHeader } from './types.js';

const RECOMMENDATION_PATTERNS = {
  // "1.1 Title (Automated)", "2.3.4 Title (Manual)", "1.1 Title\n(Not Scored)"
  header: /(?:^|\n)(\d+(?:\.\d+)+)\s+([A-Z][^\n]+?)\s*\((Automated|Manual|Scored|Not Scored)\)/g,
  profile: /•?\s*(Level \d+|Profile Applicability)/,
};

interface FieldRule {
  field: LimitedField;
  label: RegExp;
  /** Labels that may legitimately follow this one, each at the start of a line */
  terminator: RegExp;
}

/**
 * Each field runs from its label to the first following label it can be
 * terminated by, or to the end of the content window.
 */
const FIELD_RULES: readonly FieldRule[] = [
  { field: 'description', label: /Description:\s*/, terminator: /(?:^|\n)(?:Rationale|Impact|Audit):/ },
  { field: 'rationale', label: /Rationale:\s*/, terminator: /(?:^|\n)(?:Impact|Audit):/ },
  { field: 'impact', label: /Impact:\s*/, terminator: /(?:^|\n)(?:Audit|Remediation):/ },
  { field: 'audit', label: /Audit:\s*/, terminator: /(?:^|\n)(?:Remediation|Default Value):/ },
  { field: 'remediation', label: /Remediation:\s*/, terminator: /(?:^|\n)(?:Default Value|Impact|References):/ },
  { field: 'defaultValue', label: /Default Value:\s*/, terminator: /(?:^|\n)(?:References|CIS Controls):/ },
  { field: 'references', label: /References:\s*/, terminator: /(?:^|\n)(?:CIS Controls|Additional Information):/ },
];

/**
 * Find recommendation headers on one page. Each header's content window is
 * the text after it, at most `windowLength` characters and never past the
 * next header on the page. Windows do not continue onto the next page.
 */
export function findRecommendationHeaders(
  pageText: string,
  pageNumber: number,
  windowLength: number
): RecommendationHeader[] {
  const matches = [...pageText.matchAll(RECOMMENDATION_PATTERNS.header)];
  const headers: RecommendationHeader[] = [];

  for (let i = 0; i < matches.length; i++) {
    const match = matches[i];
    if (match === undefined) continue;

    const [fullMatch, num, rawTitle, rawStatus] = match;
    if (num === undefined || rawTitle === undefined) continue;

    const status = RecommendationStatusSchema.safeParse(rawStatus);
    if (!status.success) continue;

    const start = (match.index ?? 0) + fullMatch.length;
    const nextIndex = matches[i + 1]?.index ?? pageText.length;
    const end = Math.min(start + windowLength, nextIndex);

    headers.push({
      num,
      title: rawTitle.trim(),
      status: status.data,
      page: pageNumber,
      content: pageText.slice(start, end),
    });
  }

  return headers;
}

/**
 * Segment a header's content window into named fields. Absent fields are
 * empty strings; every value is trimmed and cut to its field limit.
 */
export function parseRecommendationDetails(
  header: Pick<RecommendationHeader, 'num' | 'title' | 'status'>,
  content: string
): Recommendation {
  const profileMatch = RECOMMENDATION_PATTERNS.profile.exec(content);
  const profile = profileMatch?.[1] ?? DEFAULT_PROFILE;

  const fields: Record<LimitedField, string> = {
    description: '',
    rationale: '',
    impact: '',
    audit: '',
    remediation: '',
    defaultValue: '',
    references: '',
  };

  for (const rule of FIELD_RULES) {
    const value = extractTextBetweenMarkers(content, rule.label, rule.terminator) ?? '';
    fields[rule.field] = value.slice(0, FIELD_LIMITS[rule.field]);
  }

  return {
    num: header.num,
    title: header.title,
    profile,
    status: header.status,
    ...fields,
  };
}

/**
 * A record without an audit procedure is treated as an extraction failure.
 */
export function isAcceptedRecommendation(recommendation: Recommendation): boolean {
  return recommendation.audit.length > 0;
}

export interface RecommendationExtraction {
  headersMatched: number;
  /** Accepted records in page order, before deduplication */
  recommendations: Recommendation[];
}

/**
 * Match headers on every page from `startPage` (0-based) to the end and keep
 * the records that carry an audit procedure.
 */
export function extractRecommendations(
  pdf: ExtractedPDF,
  startPage: number,
  windowLength: number
): RecommendationExtraction {
  let headersMatched = 0;
  const recommendations: Recommendation[] = [];

  for (const page of pdf.pages.slice(startPage)) {
    const headers = findRecommendationHeaders(page.text, page.pageNumber, windowLength);
    headersMatched += headers.length;

    for (const header of headers) {
      const recommendation = parseRecommendationDetails(header, header.content);
      if (isAcceptedRecommendation(recommendation)) {
        recommendations.push(recommendation);
      }
    }
  }

  return { headersMatched, recommendations };
}
