/** RSSI (dBm) at which the volume curve reaches zero. */
export const RSSI_FLOOR = -100;
/** Width of the RSSI window (dBm) mapped onto [0, 1]. */
export const RSSI_RANGE = 40;

/**
 * Map signal strength to a target volume in [0, 1].
 *
 * RSSI is normalized linearly over [-100, -60] dBm, clamped, then raised to
 * `exponent` so that weak sources fade faster than strong ones.
 */
export function rssiToVolume(rssi: number, exponent: number): number {
  const normalized = Math.max(0, Math.min(1, (rssi - RSSI_FLOOR) / RSSI_RANGE));
  return Math.pow(normalized, exponent);
}

/** One-pole lowpass step from `current` toward `target`. */
export function smoothVolume(current: number, target: number, alpha: number): number {
  return current + alpha * (target - current);
}
