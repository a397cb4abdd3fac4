import type { Bearing, SignalSource, SourceId } from './audio-types';
import { assertFinite } from './errors';
import { smoothVolume } from './volume-curve';

/** Persistent bearing storage keyed by source id. */
export interface BearingStore {
  get(id: SourceId): Bearing | undefined;
  set(id: SourceId, bearing: Bearing): void;
}

export class MemoryBearingStore implements BearingStore {
  private readonly bearings = new Map<SourceId, Bearing>();

  get(id: SourceId): Bearing | undefined {
    return this.bearings.get(id);
  }

  set(id: SourceId, bearing: Bearing): void {
    this.bearings.set(id, bearing);
  }
}

export interface SourceState {
  readonly id: SourceId;
  worldBearing: Bearing;
  smoothedVolume: number;
}

export type RandomSource = () => number;

export function sourceId(source: SignalSource): SourceId {
  return `${source.kind}:${source.address}`;
}

/**
 * Tracks per-source state across scans.
 *
 * A source keeps the same world bearing for its whole lifetime: the first
 * time it is seen the bearing comes from the store, or is drawn at random
 * in [0, 360) and written back so it survives a reset.
 */
export class SourceRegistry {
  private readonly random: RandomSource;
  private readonly store: BearingStore;
  private readonly states = new Map<SourceId, SourceState>();

  constructor(random: RandomSource = Math.random, store: BearingStore = new MemoryBearingStore()) {
    this.random = random;
    this.store = store;
  }

  getOrCreate(source: SignalSource, forcedBearing?: Bearing): SourceState {
    if (forcedBearing !== undefined) assertFinite(forcedBearing, 'forcedBearing');
    const id = sourceId(source);

    const existing = this.states.get(id);
    if (existing) {
      if (forcedBearing !== undefined && existing.worldBearing !== forcedBearing) {
        existing.worldBearing = forcedBearing;
      }
      return existing;
    }

    const state: SourceState = {
      id,
      worldBearing: forcedBearing ?? this.savedOrNewBearing(id),
      smoothedVolume: 0,
    };
    this.states.set(id, state);
    return state;
  }

  updateVolume(state: SourceState, targetVolume: number, alpha: number): void {
    state.smoothedVolume = smoothVolume(state.smoothedVolume, targetVolume, alpha);
  }

  get(id: SourceId): SourceState | undefined {
    return this.states.get(id);
  }

  get count(): number {
    return this.states.size;
  }

  /** Forget all states. Stored bearings are kept. */
  reset(): void {
    this.states.clear();
  }

  private savedOrNewBearing(id: SourceId): Bearing {
    const saved = this.store.get(id);
    // negative values are never written, treat them as unset
    if (saved !== undefined && saved >= 0) return saved;

    const bearing = this.random() * 360;
    this.store.set(id, bearing);
    return bearing;
  }
}
