/**
 * Check if a ping is low enough to count as runway traffic
 * @param altitude Reported altitude in feet (null when the transponder sent none)
 * @param ceiling Exclusive upper bound in feet
 * @returns true only for a finite altitude strictly below the ceiling
 */
export function checkAltitudeCeiling(altitude: number | null | undefined, ceiling: number): boolean {
  // No altitude means we can't tell; count it as outside
  if (altitude === null || altitude === undefined || !Number.isFinite(altitude)) {
    return false;
  }

  return altitude < ceiling;
}

/**
 * Explain why an altitude fails the ceiling check, or null when it passes
 */
export function getAltitudeRejection(altitude: number | null | undefined, ceiling: number): string | null {
  if (altitude === null || altitude === undefined || !Number.isFinite(altitude)) {
    return "no altitude data";
  }

  if (altitude >= ceiling) {
    return `at or above ceiling (${altitude}ft >= ${ceiling}ft)`;
  }

  return null;
}
