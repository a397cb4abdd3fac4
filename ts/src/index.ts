// Core panning
export { resolveRelativeAngle, wrapDegrees } from './relative-angle';
export { panStereo, foldAngle, isBehind } from './stereo-panner';
export { InvalidInputError } from './errors';
export type { Bearing, RelativeAngle, StereoGain } from './audio-types';

// Mixer
export { SpatialMixer } from './spatial-mixer';
export type { SpatialMixerOptions } from './spatial-mixer';
export { SourceRegistry, MemoryBearingStore, sourceId } from './source-registry';
export type { BearingStore, SourceState, RandomSource } from './source-registry';
export { validateSettings } from './mixer-settings';
export { rssiToVolume, smoothVolume, RSSI_FLOOR, RSSI_RANGE } from './volume-curve';
export type { SignalSource, SourceKind, SourceId, SourceGain, MixerSettings } from './audio-types';
export { DEFAULT_MIXER_SETTINGS } from './audio-types';
