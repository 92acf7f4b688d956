import type { RecommendationStatus } from '@cisbench/types';

/**
 * A recommendation header matched on a page, before field segmentation.
 */
export interface RecommendationHeader {
  num: string;
  title: string;
  status: RecommendationStatus;
  /** 1-indexed page the header was found on */
  page: number;
  /** Text following the header, bounded by the window length and the next header */
  content: string;
}
