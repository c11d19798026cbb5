import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { CatalogError } from '../../common/errors';
import { AdCatalog, CATALOG_FILE, isMediaFile, labelFromFilename } from '../src/catalog';

async function readCatalogFile(dir: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(path.join(dir, CATALOG_FILE), 'utf8'));
}

describe('AdCatalog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('builds and persists the list from the directory when no catalog file exists', async () => {
      await fs.writeFile(path.join(dir, 'b_offer.png'), 'b');
      await fs.writeFile(path.join(dir, 'a.JPG'), 'a');
      await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored');

      const catalog = new AdCatalog(dir);
      await catalog.load();

      const expected = [
        { id: 1, label: 'A', path: 'a.JPG' },
        { id: 2, label: 'B Offer', path: 'b_offer.png' }
      ];
      expect(catalog.entries()).toEqual(expected);
      expect(await readCatalogFile(dir)).toEqual(expected);
    });

    it('creates the media directory', async () => {
      const nested = path.join(dir, 'nested', 'ads');
      const catalog = new AdCatalog(nested);
      await catalog.load();
      expect(catalog.length).toBe(0);
      expect(await readCatalogFile(nested)).toEqual([]);
    });

    it('reads an existing catalog file as is', async () => {
      const stored = [
        { id: 7, label: 'Seven', path: 'seven.png' },
        { id: 3, label: 'Text only', path: null }
      ];
      await fs.writeFile(path.join(dir, CATALOG_FILE), JSON.stringify(stored));

      const catalog = new AdCatalog(dir);
      await catalog.load();
      expect(catalog.entries()).toEqual(stored);
    });

    it('rejects a catalog file that is not JSON', async () => {
      await fs.writeFile(path.join(dir, CATALOG_FILE), '{broken');
      await expect(new AdCatalog(dir).load()).rejects.toBeInstanceOf(CatalogError);
    });

    it('rejects a catalog file with the wrong shape', async () => {
      await fs.writeFile(path.join(dir, CATALOG_FILE), JSON.stringify({ ads: [] }));
      await expect(new AdCatalog(dir).load()).rejects.toThrow('does not hold a list of ads');
    });
  });

  describe('rescan', () => {
    it('keeps known files, drops missing ones and gives new files the smallest free id', async () => {
      await fs.writeFile(path.join(dir, 'a.png'), 'a');
      await fs.writeFile(path.join(dir, 'b.png'), 'b');
      const catalog = new AdCatalog(dir);
      await catalog.load();

      await fs.unlink(path.join(dir, 'a.png'));
      await fs.writeFile(path.join(dir, 'c_deal.gif'), 'c');

      expect(await catalog.rescan()).toBe(true);
      expect(catalog.entries()).toEqual([
        { id: 1, label: 'C Deal', path: 'c_deal.gif' },
        { id: 2, label: 'B', path: 'b.png' }
      ]);
      expect(await readCatalogFile(dir)).toEqual(catalog.entries());
    });

    it('reports no change when the directory is unchanged', async () => {
      await fs.writeFile(path.join(dir, 'a.png'), 'a');
      const catalog = new AdCatalog(dir);
      await catalog.load();
      expect(await catalog.rescan()).toBe(false);
    });
  });

  describe('add', () => {
    it('assigns max id + 1 and writes a placeholder image', async () => {
      await fs.writeFile(
        path.join(dir, CATALOG_FILE),
        JSON.stringify([{ id: 4, label: 'Four', path: null }])
      );
      const catalog = new AdCatalog(dir);
      await catalog.load();

      const created = await catalog.add({ label: 'Fish & Chips' });
      expect(created).toEqual({ id: 5, label: 'Fish & Chips', path: 'ad_5.svg' });

      const svg = await fs.readFile(path.join(dir, 'ad_5.svg'), 'utf8');
      expect(svg).toContain('>Fish &amp; Chips</text>');
      expect(catalog.length).toBe(2);
      expect(await readCatalogFile(dir)).toEqual(catalog.entries());
    });

    it('keeps an existing media file untouched', async () => {
      await fs.writeFile(path.join(dir, 'promo.png'), 'original bytes');
      await fs.writeFile(path.join(dir, CATALOG_FILE), '[]');
      const catalog = new AdCatalog(dir);
      await catalog.load();

      const created = await catalog.add({ label: 'Promo', path: 'promo.png' });
      expect(created).toEqual({ id: 1, label: 'Promo', path: 'promo.png' });
      expect(await fs.readFile(path.join(dir, 'promo.png'), 'utf8')).toBe('original bytes');
    });

    it('replaces a path without a media extension', async () => {
      await fs.writeFile(path.join(dir, CATALOG_FILE), '[]');
      const catalog = new AdCatalog(dir);
      await catalog.load();
      expect((await catalog.add({ label: 'Doc', path: 'readme.txt' })).path).toBe('ad_1.svg');
    });

    it('refuses paths outside the media directory', async () => {
      await fs.writeFile(path.join(dir, CATALOG_FILE), '[]');
      const catalog = new AdCatalog(dir);
      await catalog.load();
      await expect(catalog.add({ label: 'Evil', path: '../evil.png' })).rejects.toBeInstanceOf(CatalogError);
      expect(catalog.length).toBe(0);
    });
  });

  describe('remove', () => {
    it('restores the other entries and deletes the file', async () => {
      await fs.writeFile(path.join(dir, 'a.png'), 'a');
      const catalog = new AdCatalog(dir);
      await catalog.load();
      const before = catalog.entries();

      const created = await catalog.add({ label: 'Temp' });
      expect(await catalog.remove(created.id)).toBe(true);

      expect(catalog.entries()).toEqual(before);
      await expect(fs.access(path.join(dir, 'ad_2.svg'))).rejects.toThrow();
    });

    it('keeps a file another entry still uses', async () => {
      await fs.writeFile(path.join(dir, 'shared.png'), 's');
      await fs.writeFile(
        path.join(dir, CATALOG_FILE),
        JSON.stringify([
          { id: 1, label: 'One', path: 'shared.png' },
          { id: 2, label: 'Two', path: 'shared.png' }
        ])
      );
      const catalog = new AdCatalog(dir);
      await catalog.load();

      expect(await catalog.remove(1)).toBe(true);
      expect(await fs.readFile(path.join(dir, 'shared.png'), 'utf8')).toBe('s');
      expect(catalog.entries()).toEqual([{ id: 2, label: 'Two', path: 'shared.png' }]);
    });

    it('returns false for an unknown id', async () => {
      const catalog = new AdCatalog(dir);
      await catalog.load();
      expect(await catalog.remove(99)).toBe(false);
    });
  });

  describe('readMedia', () => {
    it('returns file bytes, or null when missing or outside the directory', async () => {
      const mediaDir = path.join(dir, 'media');
      await fs.mkdir(mediaDir);
      await fs.writeFile(path.join(mediaDir, 'a.png'), 'bytes');
      await fs.writeFile(path.join(dir, 'outside.png'), 'private');
      const catalog = new AdCatalog(mediaDir);
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      expect((await catalog.readMedia('a.png'))?.toString()).toBe('bytes');
      expect(await catalog.readMedia('missing.png')).toBeNull();
      expect(await catalog.readMedia('../outside.png')).toBeNull();
    });
  });
});

describe('catalog helpers', () => {
  it('derives labels from file names', () => {
    expect(labelFromFilename('summer_sale.png')).toBe('Summer Sale');
    expect(labelFromFilename('BIG_deal.jpeg')).toBe('Big Deal');
  });

  it('recognizes media extensions case-insensitively', () => {
    expect(isMediaFile('X.PNG')).toBe(true);
    expect(isMediaFile('clip.mp4')).toBe(false);
    expect(isMediaFile(CATALOG_FILE)).toBe(false);
  });
});
