import type { Bearing, RelativeAngle } from './audio-types';
import { assertFinite } from './errors';

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

/**
 * Angle of a source relative to the listener's facing direction.
 *
 * The raw delta is wrapped with atan2(sin, cos), so bearings of any
 * magnitude resolve without modulo branches. Output lies in (-180, 180];
 * at the ±180 seam a ULP-level change in input can flip the sign.
 *
 * @throws InvalidInputError if either bearing is NaN or infinite.
 */
export function resolveRelativeAngle(listenerBearing: Bearing, sourceBearing: Bearing): RelativeAngle {
  assertFinite(listenerBearing, 'listenerBearing');
  assertFinite(sourceBearing, 'sourceBearing');

  const delta = (sourceBearing - listenerBearing) * DEG_TO_RAD;
  const degrees = Math.atan2(Math.sin(delta), Math.cos(delta)) * RAD_TO_DEG;
  // rounding in the degree conversion can land exactly on -180
  return degrees === -180 ? 180 : degrees;
}

/** Reduce any finite angle into (-180, 180]. */
export function wrapDegrees(angle: number): RelativeAngle {
  assertFinite(angle, 'angle');
  // % is exact for doubles of any magnitude; r lands in [0, 360)
  const r = ((angle % 360) + 360) % 360;
  return r > 180 ? r - 360 : r;
}
