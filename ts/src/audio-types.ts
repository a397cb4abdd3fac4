/** Absolute orientation in degrees. Any real number; the caller fixes the reference frame. */
export type Bearing = number;

/**
 * Source position relative to the listener's facing direction, in degrees,
 * normalized to (-180, 180]. 0 = ahead, +90 = right, -90 = left, ±180 = behind.
 */
export type RelativeAngle = number;

/** Amplitude multipliers for the two output channels. Returned fresh by every pan call. */
export interface StereoGain {
  readonly left: number;
  readonly right: number;
}

export type SourceKind = 'ble' | 'wifi';

/** `${kind}:${address}` — stable identity of a signal source across scans. */
export type SourceId = `${SourceKind}:${string}`;

/** A radio signal source as reported by a scan. */
export interface SignalSource {
  address: string;
  name?: string;
  /** Received signal strength in dBm. */
  rssi: number;
  kind: SourceKind;
}

/** Mixer configuration. All fields are validated by validateSettings(). */
export interface MixerSettings {
  /** Output volume multiplier, 0 to 1. Default: 0.08. */
  masterVolume: number;
  /** Sources at or below this RSSI (dBm) are ignored, -100 to -50. Default: -90. */
  rssiThreshold: number;
  /** Number of strongest sources that get gains, 1 to 100. Default: 40. */
  maxActiveSources: number;
  /** Exponent of the RSSI volume curve, 1 to 4. Default: 2 (quadratic). */
  volumeCurveExponent: number;
  /** Gain multiplier for sources behind the listener, 0 to 1. Default: 0.3. */
  behindAttenuation: number;
  /** One-pole smoothing factor for volume changes, (0, 1]. Default: 0.1. */
  volumeSmoothing: number;
}

/** Per-source output of SpatialMixer.computeGains(). */
export interface SourceGain {
  id: SourceId;
  relativeAngle: RelativeAngle;
  /** Smoothed volume before master volume is applied. */
  volume: number;
  gain: StereoGain;
}

export const DEFAULT_MIXER_SETTINGS: Readonly<MixerSettings> = {
  masterVolume: 0.08,
  rssiThreshold: -90,
  maxActiveSources: 40,
  volumeCurveExponent: 2,
  behindAttenuation: 0.3,
  volumeSmoothing: 0.1,
};
