/**
 * Constant-power stereo panning from a relative angle.
 *
 * Front and back hemispheres share one lateral pan curve: an angle is folded
 * onto [-90, 90] by reflecting about ±90, so 120° pans like 60° and 180°
 * like 0°. The hemisphere survives only as the rear attenuation multiplier,
 * which is decided from the unfolded angle.
 *
 * Sign convention: a negative folded angle is left-dominant. Callers must pick
 * bearings with a matching handedness.
 */

import type { RelativeAngle, StereoGain } from './audio-types';
import { wrapDegrees } from './relative-angle';

/**
 * Fold an angle onto [-90, 90] by reflection about ±90.
 *
 * Same result as repeatedly applying `a = 180 - a` while a > 90 and
 * `a = -180 - a` while a < -90, but in constant time for any magnitude.
 */
export function foldAngle(angle: number): number {
  const wrapped = wrapDegrees(angle);
  if (wrapped > 90) return 180 - wrapped;
  if (wrapped < -90) return -180 - wrapped;
  return wrapped;
}

/** True when the angle, reduced into (-180, 180], points into the rear hemisphere. */
export function isBehind(angle: number): boolean {
  return Math.abs(wrapDegrees(angle)) > 90;
}

/**
 * Compute left/right gains for a source at `relativeAngle` degrees.
 *
 * With `behindAttenuation` at 1, left² + right² = 1 for every angle.
 * Rear sources (|angle| > 90 after reduction) have both gains multiplied by
 * `behindAttenuation`; the value is a plain multiplier and is not range-checked.
 *
 * @throws InvalidInputError if `relativeAngle` is NaN or infinite.
 */
export function panStereo(relativeAngle: RelativeAngle, behindAttenuation = 1.0): StereoGain {
  const folded = foldAngle(relativeAngle);
  const position = Math.abs(folded) / 90;

  const toward = Math.sqrt((position + 1) / 2);
  const away = Math.sqrt((1 - position) / 2);

  const attenuation = isBehind(relativeAngle) ? behindAttenuation : 1;

  if (folded < 0) {
    return { left: toward * attenuation, right: away * attenuation };
  }
  return { left: away * attenuation, right: toward * attenuation };
}
