import { describe, it, expect, beforeEach } from 'vitest';
import * as path from 'path';
import { ActiveAssetRegistry } from './active-asset.registry';

describe('ActiveAssetRegistry', () => {
  let registry: ActiveAssetRegistry;
  const media = path.join(path.sep, 'srv', 'media');

  beforeEach(() => {
    registry = new ActiveAssetRegistry();
  });

  it('starts empty', () => {
    expect(registry.current()).toBeNull();
    expect(registry.isProtected(path.join(media, 'a.mp4'))).toBe(false);
  });

  it('compares resolved paths', () => {
    registry.protect(path.join(media, 'sub', '..', 'a.mp4'));

    expect(registry.current()).toBe(path.join(media, 'a.mp4'));
    expect(registry.isProtected(path.join(media, 'a.mp4'))).toBe(true);
    expect(registry.isProtected(path.join(media, 'b.mp4'))).toBe(false);
  });

  it('only releases the path it still holds', () => {
    registry.protect(path.join(media, 'a.mp4'));
    registry.protect(path.join(media, 'b.mp4'));

    expect(registry.release(path.join(media, 'a.mp4'))).toBe(false);
    expect(registry.current()).toBe(path.join(media, 'b.mp4'));

    expect(registry.release(path.join(media, 'b.mp4'))).toBe(true);
    expect(registry.current()).toBeNull();
  });
});
