// Congestion bands used for colouring segments on a map

export type SpeedLevel = 'free' | 'moderate' | 'slow' | 'congested' | 'unknown';

export type SpeedGrade = {
  level: SpeedLevel;
  color: string;
};

/**
 * Bands ordered from fastest to slowest; the first whose floor is met wins.
 */
export const SPEED_BANDS: readonly { minKmh: number; level: SpeedLevel; color: string }[] = [
  { minKmh: 45, level: 'free', color: '#2E7D32' },
  { minKmh: 30, level: 'moderate', color: '#F9A825' },
  { minKmh: 15, level: 'slow', color: '#EF6C00' },
  { minKmh: Number.NEGATIVE_INFINITY, level: 'congested', color: '#C62828' },
];

export const UNKNOWN_SPEED_GRADE: SpeedGrade = { level: 'unknown', color: '#888888' };

export function gradeSpeed(speedKmh: number | null | undefined): SpeedGrade {
  if (speedKmh === null || speedKmh === undefined || Number.isNaN(speedKmh)) {
    return UNKNOWN_SPEED_GRADE;
  }

  for (const band of SPEED_BANDS) {
    if (speedKmh >= band.minKmh) {
      return { level: band.level, color: band.color };
    }
  }

  return UNKNOWN_SPEED_GRADE;
}
