/**
 * Capacity Policy
 *
 * Buffers hold a bounded number of lines of bounded length. Ingestion
 * past either bound truncates and reports what was dropped.
 */

import { boundaryAtOrBefore } from './code-points.ts';

export interface CapacityPolicy {
  maxLines: number;
  maxLineLength: number;
  maxBuffers: number;
}

export const DEFAULT_CAPACITY: CapacityPolicy = {
  maxLines: 10000,
  maxLineLength: 2048,
  maxBuffers: 50,
};

export interface TruncationReport {
  /** Lines past maxLines that were not ingested */
  droppedLines: number;
  /** Lines that lost characters past maxLineLength */
  clippedLines: number;
}

export const NO_TRUNCATION: TruncationReport = { droppedLines: 0, clippedLines: 0 };

export function isTruncated(report: TruncationReport): boolean {
  return report.droppedLines > 0 || report.clippedLines > 0;
}

export interface IngestResult {
  lines: string[];
  truncation: TruncationReport;
}

/**
 * Apply the line-count and line-length bounds, transforming each kept
 * line with `transform` first.
 */
export function ingestLines(
  rawLines: readonly string[],
  policy: CapacityPolicy,
  transform: (line: string) => string = (line) => line
): IngestResult {
  const kept = rawLines.slice(0, policy.maxLines);
  let clippedLines = 0;

  const lines = kept.map((raw) => {
    const line = transform(raw);
    if (line.length > policy.maxLineLength) {
      clippedLines++;
      return line.slice(0, boundaryAtOrBefore(line, policy.maxLineLength));
    }
    return line;
  });

  return {
    lines,
    truncation: {
      droppedLines: rawLines.length - kept.length,
      clippedLines,
    },
  };
}

/**
 * Short human-readable summary of a truncation report.
 */
export function describeTruncation(report: TruncationReport): string {
  const parts: string[] = [];
  if (report.droppedLines > 0) {
    parts.push(`${report.droppedLines} lines dropped`);
  }
  if (report.clippedLines > 0) {
    parts.push(`${report.clippedLines} lines clipped`);
  }
  return parts.join(', ');
}
