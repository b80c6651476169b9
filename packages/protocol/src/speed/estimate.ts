// Speed estimation from a travel time over a known distance

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)s$/;

/**
 * Parse a duration given either as seconds or as a protobuf Duration string ("67.2s").
 * @returns seconds, or null if the value is missing or malformed
 */
export function parseDurationSeconds(duration: string | number | null | undefined): number | null {
  if (duration === null || duration === undefined) return null;

  if (typeof duration === 'number') {
    return Number.isFinite(duration) ? duration : null;
  }

  const match = DURATION_PATTERN.exec(duration.trim());
  if (!match) return null;

  return Number.parseFloat(match[1]);
}

/**
 * Estimate speed in km/h from a distance in meters and a travel duration.
 * Returns null when either input cannot yield a meaningful speed.
 *
 * @example
 * ```ts
 * estimateSpeedKmh(1000, '100s'); // 36
 * estimateSpeedKmh(1000, '0s');   // null
 * ```
 */
export function estimateSpeedKmh(
  distanceM: number | null | undefined,
  duration: string | number | null | undefined
): number | null {
  if (distanceM === null || distanceM === undefined) return null;
  if (!Number.isFinite(distanceM) || distanceM < 0) return null;

  const seconds = parseDurationSeconds(duration);
  if (seconds === null || seconds <= 0) return null;

  return (distanceM / seconds) * 3.6;
}

/**
 * Round to a fixed number of decimals for presentation and storage.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
