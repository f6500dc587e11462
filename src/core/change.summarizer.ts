import { ChangeStats, ChangeSummary } from '../types/status.types';

/**
 * Round to the nearest integer, halves away from zero (2.5 → 3, -2.5 → -3)
 */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/**
 * Percentages describing a diff against the line count after it applied.
 *
 * `priorLines` is reconstructed as `total - inserted + deleted`; when it is
 * zero the whole file is new and there is no size change to report.
 */
export function summarizeChanges(stats: ChangeStats): ChangeSummary {
  const { inserted, deleted, totalLinesAfter } = stats;
  const priorLines = totalLinesAfter - inserted + deleted;

  const summary: ChangeSummary = {
    totalLines: totalLinesAfter,
    allNew: priorLines === 0,
  };

  if (priorLines > 0) {
    summary.sizeChangePercent = roundHalfAwayFromZero(((inserted - deleted) * 100) / priorLines);
  }
  if (totalLinesAfter > 0) {
    summary.modifiedLinesPercent = roundHalfAwayFromZero((inserted * 100) / totalLinesAfter);
  }

  return summary;
}
