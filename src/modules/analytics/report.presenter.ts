/**
 * Plain-text rendering of a RideAnalysisReport, one entry per output line.
 */

import { RideAnalysisReport } from './analytics.schema';

const NO_HUB = '(none)';

export function formatReport(report: RideAnalysisReport): string[] {
  const lines: string[] = [`Total rides after filter: ${report.totalRides}`, ''];

  lines.push(`Top ${report.topRoutes.length} routes:`);
  for (const { origin, destination, count } of report.topRoutes) {
    lines.push(`  ${origin} -> ${destination}: ${count} ${count === 1 ? 'trip' : 'trips'}`);
  }

  lines.push('', `Personal hub: ${report.hubs.personal || NO_HUB}`, `Business hub: ${report.hubs.business || NO_HUB}`);

  if (report.topRoutePath) {
    const { origin, destination, path } = report.topRoutePath;
    lines.push('', `Shortest ${origin} -> ${destination}: ${path.join(' -> ')}`);
  }

  const { mean, stdDev, max } = report.distanceStats;
  lines.push('', `Graph hops - mean: ${mean.toFixed(2)}, stddev: ${stdDev.toFixed(2)}, max: ${max}`);

  return lines;
}
