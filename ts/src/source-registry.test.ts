import { describe, it, expect, vi } from 'vitest';
import { MemoryBearingStore, SourceRegistry, sourceId } from './source-registry';
import type { SignalSource } from './audio-types';
import { InvalidInputError } from './errors';

function source(address: string, overrides: Partial<SignalSource> = {}): SignalSource {
  return { address, rssi: -70, kind: 'ble', ...overrides };
}

describe('sourceId', () => {
  it('combines kind and address', () => {
    expect(sourceId(source('AA:BB'))).toBe('ble:AA:BB');
    expect(sourceId(source('router', { kind: 'wifi' }))).toBe('wifi:router');
  });
});

describe('SourceRegistry', () => {
  it('assigns a random bearing to a new source and saves it', () => {
    const store = new MemoryBearingStore();
    const reg = new SourceRegistry(() => 0.25, store);
    const state = reg.getOrCreate(source('a'));
    expect(state.worldBearing).toBe(90);
    expect(state.smoothedVolume).toBe(0);
    expect(store.get('ble:a')).toBe(90);
  });

  it('returns the same state for a known source', () => {
    const random = vi.fn(() => 0.5);
    const reg = new SourceRegistry(random);
    const first = reg.getOrCreate(source('a'));
    const second = reg.getOrCreate(source('a', { rssi: -60 }));
    expect(second).toBe(first);
    expect(random).toHaveBeenCalledTimes(1);
    expect(reg.count).toBe(1);
  });

  it('uses a saved bearing when there is one', () => {
    const store = new MemoryBearingStore();
    store.set('wifi:x', 45);
    const random = vi.fn(() => 0.5);
    const reg = new SourceRegistry(random, store);
    expect(reg.getOrCreate(source('x', { kind: 'wifi' })).worldBearing).toBe(45);
    expect(random).not.toHaveBeenCalled();
  });

  it('treats a negative saved bearing as unset', () => {
    const store = new MemoryBearingStore();
    store.set('ble:a', -1);
    const reg = new SourceRegistry(() => 0.5, store);
    expect(reg.getOrCreate(source('a')).worldBearing).toBe(180);
    expect(store.get('ble:a')).toBe(180);
  });

  it('places a new source at a forced bearing without saving it', () => {
    const store = new MemoryBearingStore();
    const reg = new SourceRegistry(() => 0.5, store);
    expect(reg.getOrCreate(source('a'), 0).worldBearing).toBe(0);
    expect(store.get('ble:a')).toBeUndefined();
  });

  it('moves a known source to a forced bearing', () => {
    const reg = new SourceRegistry(() => 0.25);
    const state = reg.getOrCreate(source('a'));
    reg.getOrCreate(source('a'), 270);
    expect(state.worldBearing).toBe(270);
  });

  it('rejects a non-finite forced bearing', () => {
    const reg = new SourceRegistry();
    expect(() => reg.getOrCreate(source('a'), NaN)).toThrow(InvalidInputError);
  });

  it('smooths volume toward the target', () => {
    const reg = new SourceRegistry(() => 0);
    const state = reg.getOrCreate(source('a'));
    reg.updateVolume(state, 1, 0.5);
    expect(state.smoothedVolume).toBe(0.5);
    reg.updateVolume(state, 1, 0.5);
    expect(state.smoothedVolume).toBe(0.75);
  });

  it('reset forgets states but keeps saved bearings', () => {
    const random = vi.fn(() => 0.25);
    const reg = new SourceRegistry(random);
    reg.getOrCreate(source('a'));
    reg.reset();
    expect(reg.count).toBe(0);
    expect(reg.get('ble:a')).toBeUndefined();
    expect(reg.getOrCreate(source('a')).worldBearing).toBe(90);
    expect(random).toHaveBeenCalledTimes(1);
  });
});
