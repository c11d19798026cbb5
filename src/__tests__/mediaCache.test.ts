import fs from 'fs';
import os from 'os';
import path from 'path';
import { MediaCacheError } from '../../common/errors';
import { MediaCache } from '../utils/mediaCache';

describe('MediaCache', () => {
  let root: string;
  let cache: MediaCache;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'media-cache-'));
    cache = new MediaCache(path.join(root, 'ads_local'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('creates its directory', () => {
    expect(fs.statSync(path.join(root, 'ads_local')).isDirectory()).toBe(true);
  });

  it('stores decoded bytes under the file name', async () => {
    expect(cache.has('promo.png')).toBe(false);

    const saved = await cache.save('promo.png', Buffer.from('image bytes').toString('base64'));

    expect(saved).toBe(path.join(root, 'ads_local', 'promo.png'));
    expect(fs.readFileSync(saved, 'utf8')).toBe('image bytes');
    expect(cache.has('promo.png')).toBe(true);
  });

  it('does not count directories as cached files', () => {
    fs.mkdirSync(path.join(root, 'ads_local', 'folder.png'));
    expect(cache.has('folder.png')).toBe(false);
  });

  it.each(['../escape.png', 'nested/file.png', 'back\\slash.png', '..', ''])('rejects %p', async (name) => {
    expect(() => cache.pathFor(name)).toThrow(MediaCacheError);
    await expect(cache.save(name, '')).rejects.toBeInstanceOf(MediaCacheError);
  });
});
