/**
 * CoordinateTransform - CORSIKA to GrIsu (KASCADE) coordinates
 *
 * - CORSIKA: x to north, y to west, z upwards, azimuth counter-clockwise
 * - GrIsu:   x to east, y to south, z downwards, azimuth clockwise
 *
 * Only azimuth and ground position change; zenith angles are the same in
 * both systems.
 */

import { Angle } from "@/math/Angle";
import type { AzimuthPosition, Position2 } from "@/types";

const THREE_HALVES_PI = 1.5 * Math.PI;

/**
 * Swap and negate a ground position: (x, y) -> (-y, -x).
 * Applying it twice returns the original position.
 */
export function transformPosition(x: number, y: number): Position2 {
  return { x: -y, y: -x };
}

/**
 * Transform an azimuth (radians) and ground position from CORSIKA to GrIsu
 * coordinates. Returns a new triple; the azimuth is in [0, 2π).
 */
export function transformCoord(azimuth: number, x: number, y: number): AzimuthPosition {
  const position = transformPosition(x, y);
  return {
    azimuth: Angle.reduce(THREE_HALVES_PI - Angle.reduce(azimuth)),
    x: position.x,
    y: position.y,
  };
}
