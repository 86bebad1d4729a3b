/**
 * Angle - Pure utility functions for angle handling
 * All angles are radians unless the name says otherwise
 */

const TWO_PI = 2 * Math.PI;

/** Degrees per radian */
export const DEGRAD = 45 / Math.atan(1);

export const Angle = {
  /**
   * Reduce an angle to the interval [0, 2π)
   * reduce(0) === reduce(2π) === 0, and reduce is idempotent
   */
  reduce(angle: number): number {
    let reduced = angle - Math.floor(angle / TWO_PI) * TWO_PI;
    // Rounding can push the result just outside the interval
    if (reduced < 0) reduced += TWO_PI;
    if (reduced >= TWO_PI) reduced = 0;
    return reduced;
  },

  toDegrees(radians: number): number {
    return radians * DEGRAD;
  },

  toRadians(degrees: number): number {
    return degrees / DEGRAD;
  },

  /**
   * Zenith angle (radians) from an altitude angle in degrees
   */
  zenithFromAltitude(altitudeDegrees: number): number {
    return (90 - altitudeDegrees) / DEGRAD;
  },

  /**
   * Zenith angle of a direction given by its horizontal direction cosines.
   * Negative 1 - (cx² + cy²) from rounding counts as horizontal.
   */
  zenithFromDirectionCosines(cx: number, cy: number): number {
    const cz2 = 1 - (cx * cx + cy * cy);
    return Math.acos(cz2 > 0 ? Math.sqrt(cz2) : 0);
  },
};
