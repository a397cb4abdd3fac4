import type { MixerSettings } from './audio-types';
import { DEFAULT_MIXER_SETTINGS } from './audio-types';
import { InvalidInputError } from './errors';

type NumericRange = { min: number; max: number; minExclusive?: boolean };

const RANGES: [keyof MixerSettings, NumericRange][] = [
  ['masterVolume', { min: 0, max: 1 }],
  ['rssiThreshold', { min: -100, max: -50 }],
  ['maxActiveSources', { min: 1, max: 100 }],
  ['volumeCurveExponent', { min: 1, max: 4 }],
  ['behindAttenuation', { min: 0, max: 1 }],
  ['volumeSmoothing', { min: 0, max: 1, minExclusive: true }],
];

function checkRange(field: keyof MixerSettings, value: number, range: NumericRange): void {
  const { min, max, minExclusive } = range;
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${field} must be a finite number, got ${value}`);
  }
  const belowMin = minExclusive ? value <= min : value < min;
  if (belowMin || value > max) {
    const lower = minExclusive ? '(' : '[';
    throw new InvalidInputError(`${field} must be in ${lower}${min}, ${max}], got ${value}`);
  }
}

/**
 * Merge partial settings over `base` and validate every field.
 * Fields that are missing or undefined take the value from `base`.
 *
 * @throws InvalidInputError naming the first invalid field.
 */
export function validateSettings(
  settings?: Partial<MixerSettings>,
  base: Readonly<MixerSettings> = DEFAULT_MIXER_SETTINGS,
): MixerSettings {
  const resolved: MixerSettings = { ...base };

  for (const [field, range] of RANGES) {
    const value = settings?.[field] ?? base[field];
    checkRange(field, value, range);
    resolved[field] = value;
  }
  if (!Number.isInteger(resolved.maxActiveSources)) {
    throw new InvalidInputError(`maxActiveSources must be an integer, got ${resolved.maxActiveSources}`);
  }
  return resolved;
}
