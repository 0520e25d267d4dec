import type {
  BoundingBox,
  ConfidenceSource,
  Polygon,
  RecognitionLine,
  RecognitionPage,
} from '@freight/shared/schemas/documentTypes.zod';
import type { RecognitionResult } from '../../models/Recognition';
import { deepFreeze } from '../../utils/freeze';

const CONFIDENCE_MIN = 0;
const CONFIDENCE_MAX = 1;
const LINE_SEPARATOR = '\n';
const PAGE_SEPARATOR = '\n\n';
const BBOX_LENGTH = 4;
const POLYGON_MIN_POINTS = 4;

export interface PageInput {
  pageNumber: number;
  lines: RecognitionLine[];
}

export interface RecognitionResultInput {
  providerName: string;
  pages: PageInput[];
  confidenceSource: ConfidenceSource;
  processingTimeMs: number;
  warnings?: string[];
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return CONFIDENCE_MIN;
  }
  return Math.max(CONFIDENCE_MIN, Math.min(CONFIDENCE_MAX, value));
}

function mean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function toBoundingBox(values: number[] | null | undefined): BoundingBox | null {
  if (!values || values.length < BBOX_LENGTH || values.slice(0, BBOX_LENGTH).some((v) => !Number.isFinite(v))) {
    return null;
  }
  return [values[0], values[1], values[2], values[3]];
}

export function polygonFromBbox([x1, y1, x2, y2]: BoundingBox): Polygon {
  return [
    [x1, y1],
    [x2, y1],
    [x2, y2],
    [x1, y2],
  ];
}

export function toPolygon(points: number[][] | null | undefined, bbox: BoundingBox): Polygon {
  if (!points || points.length < POLYGON_MIN_POINTS) {
    return polygonFromBbox(bbox);
  }

  const polygon: Polygon = [];
  for (const point of points) {
    if (point.length < 2 || !Number.isFinite(point[0]) || !Number.isFinite(point[1])) {
      return polygonFromBbox(bbox);
    }
    polygon.push([point[0], point[1]]);
  }
  return polygon;
}

function buildPage(input: PageInput): RecognitionPage {
  return {
    pageNumber: input.pageNumber,
    text: input.lines.map((line) => line.text).join(LINE_SEPARATOR),
    lines: input.lines,
    averageConfidence: mean(input.lines.map((line) => line.confidence)),
  };
}

/**
 * Assembles an immutable recognition result. `averageConfidence` is always
 * the mean over every line on every page, 0 when there are no lines.
 */
export function buildRecognitionResult(input: RecognitionResultInput): RecognitionResult {
  const pages = input.pages.map(buildPage);
  const allConfidences = pages.flatMap((page) => page.lines.map((line) => line.confidence));

  const result: RecognitionResult = {
    pages,
    fullText: pages
      .map((page) => page.text)
      .filter((text) => text.length > 0)
      .join(PAGE_SEPARATOR),
    averageConfidence: mean(allConfidences),
    providerName: input.providerName,
    pageCount: pages.length,
    confidenceSource: input.confidenceSource,
    processingTimeMs: input.processingTimeMs,
    warnings: [...(input.warnings ?? [])],
  };

  return deepFreeze(result);
}

export function withWarnings(result: RecognitionResult, warnings: string[]): RecognitionResult {
  return deepFreeze({
    ...result,
    warnings: [...result.warnings, ...warnings],
  });
}
