// Dashboard figures over the latest-speed view

import { roundTo } from '@roadspeed/protocol';
import type { LatestSpeedSummary, SpeedObservation } from '@roadspeed/protocol';

/**
 * Count segments with a known speed, their mean speed (one decimal),
 * and how many fall under 15 and 10 km/h.
 */
export function summarizeLatest(entries: Iterable<SpeedObservation>): LatestSpeedSummary {
  const speeds: number[] = [];
  for (const obs of entries) {
    if (obs.speedKmh !== null) speeds.push(obs.speedKmh);
  }

  const total = speeds.reduce((sum, v) => sum + v, 0);

  return {
    segmentsWithData: speeds.length,
    averageSpeedKmh: speeds.length > 0 ? roundTo(total / speeds.length, 1) : null,
    below15Kmh: speeds.filter((v) => v < 15).length,
    below10Kmh: speeds.filter((v) => v < 10).length,
  };
}
