import type { Bearing, MixerSettings, SignalSource, SourceGain, SourceId } from './audio-types';
import { assertFinite } from './errors';
import { validateSettings } from './mixer-settings';
import { resolveRelativeAngle } from './relative-angle';
import { SourceRegistry } from './source-registry';
import type { BearingStore, RandomSource, SourceState } from './source-registry';
import { panStereo } from './stereo-panner';
import { rssiToVolume } from './volume-curve';

export interface SpatialMixerOptions {
  /** Overrides merged over DEFAULT_MIXER_SETTINGS. */
  settings?: Partial<MixerSettings>;
  /** Random number source for new source bearings. Overridable for testing. */
  random?: RandomSource;
  /** Where assigned bearings are persisted. Default: in-memory. */
  store?: BearingStore;
  /** Called with the number of audible sources left out by maxActiveSources. */
  onOverflow?: (dropped: number) => void;
  /** Log a debug line every N computeGains() calls. Off when unset. */
  logInterval?: number;
}

/**
 * Turns a listener bearing and a scanned source list into per-source stereo
 * gains. Produces the gain plan only; applying it to sample buffers is up
 * to the mixing engine.
 */
export class SpatialMixer {
  private readonly registry: SourceRegistry;
  private readonly onOverflow?: (dropped: number) => void;
  private readonly logInterval: number;
  private _settings: MixerSettings;
  private sources: SignalSource[] = [];
  private listenerBearing: Bearing = 0;
  private frameCount = 0;
  private lastDropped = 0;

  constructor(opts?: SpatialMixerOptions) {
    this._settings = validateSettings(opts?.settings);
    this.registry = new SourceRegistry(opts?.random, opts?.store);
    this.onOverflow = opts?.onOverflow;
    this.logInterval = opts?.logInterval ?? 0;
  }

  get settings(): Readonly<MixerSettings> {
    return this._settings;
  }

  get sourceCount(): number {
    return this.sources.length;
  }

  sourceState(id: SourceId): SourceState | undefined {
    return this.registry.get(id);
  }

  /** Fields left out or set to undefined keep their current value. */
  updateSettings(settings: Partial<MixerSettings>): void {
    this._settings = validateSettings(settings, this._settings);
  }

  /** Replace the source list. Sources at or below rssiThreshold are dropped; the rest are sorted strongest first. */
  updateSources(sources: readonly SignalSource[]): void {
    const threshold = this._settings.rssiThreshold;
    this.sources = sources
      .filter((s) => s.rssi > threshold)
      .sort((a, b) => b.rssi - a.rssi);
  }

  updateListener(bearing: Bearing): void {
    assertFinite(bearing, 'listener bearing');
    this.listenerBearing = bearing;
  }

  computeGains(): SourceGain[] {
    const s = this._settings;
    const active = this.sources.slice(0, s.maxActiveSources);
    const dropped = this.sources.length - active.length;
    if (dropped > 0) {
      if (this.onOverflow) this.onOverflow(dropped);
      else if (dropped !== this.lastDropped) {
        console.warn(`SpatialMixer: ${dropped} source(s) over maxActiveSources dropped`);
      }
    }
    this.lastDropped = dropped;

    const result: SourceGain[] = [];
    for (const source of active) {
      const state = this.registry.getOrCreate(source);
      this.registry.updateVolume(state, rssiToVolume(source.rssi, s.volumeCurveExponent), s.volumeSmoothing);

      // a lone source is always placed straight ahead
      const relativeAngle = s.maxActiveSources === 1
        ? 0
        : resolveRelativeAngle(this.listenerBearing, state.worldBearing);
      const pan = panStereo(relativeAngle, s.behindAttenuation);
      const scale = state.smoothedVolume * s.masterVolume;

      result.push({
        id: state.id,
        relativeAngle,
        volume: state.smoothedVolume,
        gain: { left: pan.left * scale, right: pan.right * scale },
      });
    }

    if (this.logInterval > 0 && this.frameCount % this.logInterval === 0 && result.length > 0) {
      const first = result[0];
      console.debug(
        `SpatialMixer: listener=${this.listenerBearing.toFixed(1)}° sources=${result.length} ` +
        `first=${first.id} relative=${first.relativeAngle.toFixed(1)}° ` +
        `L=${first.gain.left.toFixed(3)} R=${first.gain.right.toFixed(3)}`,
      );
    }
    this.frameCount++;
    return result;
  }

  /** Forget all source states and the current source list. */
  reset(): void {
    this.registry.reset();
    this.sources = [];
    this.frameCount = 0;
    this.lastDropped = 0;
  }
}
