import fs from 'fs/promises';
import path from 'path';
import { CatalogError } from '../../common/errors';
import { createLogger } from '../../common/logging';
import { CatalogFileSchema } from '../../common/schemas';
import { MediaEntry } from '../../common/types';

const log = createLogger('CATALOG');

export const CATALOG_FILE = 'ad_list.json';
export const MEDIA_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.svg'];

export interface NewEntry {
  label: string;
  path?: string;
}

export function isMediaFile(filename: string): boolean {
  const lower = filename.toLowerCase();
  return lower !== CATALOG_FILE && MEDIA_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/** "summer_sale.png" -> "Summer Sale" */
export function labelFromFilename(filename: string): string {
  const base = path.parse(filename).name.replace(/_/g, ' ');
  return base.replace(/\S+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function smallestUnusedId(used: Set<number>): number {
  let id = 1;
  while (used.has(id)) id++;
  return id;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function placeholderSvg(label: string): string {
  return [
    '<svg xmlns="http://www.w3.org/2000/svg" width="640" height="480">',
    '  <rect width="100%" height="100%" fill="#f0f0f0"/>',
    `  <text x="320" y="240" text-anchor="middle" font-size="32" fill="#000">${escapeXml(label)}</text>`,
    '</svg>',
    ''
  ].join('\n');
}

/**
 * Ordered list of media entries persisted as ad_list.json in the media
 * directory. Not synchronized: the server calls every mutation under its lock.
 */
export class AdCatalog {
  private ads: MediaEntry[] = [];

  constructor(readonly mediaDir: string) {}

  get catalogPath(): string {
    return path.join(this.mediaDir, CATALOG_FILE);
  }

  get length(): number {
    return this.ads.length;
  }

  entries(): MediaEntry[] {
    return this.ads.map((ad) => ({ ...ad }));
  }

  async load(): Promise<void> {
    await fs.mkdir(this.mediaDir, { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.catalogPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        await this.rescan();
        await this.save();
        log.info(`Created ad list with ${this.ads.length} ads`);
        return;
      }
      throw new CatalogError(`Cannot read ${this.catalogPath}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CatalogError(`${this.catalogPath} is not valid JSON`, error);
    }
    const result = CatalogFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new CatalogError(`${this.catalogPath} does not hold a list of ads`, result.error);
    }
    this.ads = result.data;
    log.info(`Loaded ${this.ads.length} ads`);
  }

  async save(): Promise<void> {
    await fs.writeFile(this.catalogPath, JSON.stringify(this.ads, null, 2), 'utf8');
  }

  /**
   * Rebuilds the list from the media directory. Returns true (and persists)
   * when the set of paths changed.
   */
  async rescan(): Promise<boolean> {
    const files = (await this.listMediaFiles()).sort();
    const byPath = new Map<string, MediaEntry>();
    for (const ad of this.ads) {
      if (ad.path !== null && !byPath.has(ad.path)) {
        byPath.set(ad.path, ad);
      }
    }

    const kept = files.flatMap((file) => {
      const existing = byPath.get(file);
      return existing ? [existing] : [];
    });
    const used = new Set(kept.map((ad) => ad.id));
    const added: MediaEntry[] = [];
    for (const file of files) {
      if (byPath.has(file)) continue;
      const id = smallestUnusedId(used);
      used.add(id);
      added.push({ id, label: labelFromFilename(file), path: file });
      log.info(`Added new ad from file: ${file}`);
    }

    const next = [...kept, ...added].sort((a, b) => a.id - b.id);
    const before = new Set(this.ads.map((ad) => ad.path));
    const after = new Set(next.map((ad) => ad.path));
    const changed = next.length !== this.ads.length || !sameSet(before, after);
    if (!changed) {
      return false;
    }

    this.ads = next;
    log.info(`Updated ad list, now contains ${this.ads.length} ads`);
    await this.save();
    return true;
  }

  async add(entry: NewEntry): Promise<MediaEntry> {
    const id = Math.max(0, ...this.ads.map((ad) => ad.id)) + 1;
    const filename = entry.path && isMediaFile(entry.path) ? entry.path : `ad_${id}.svg`;
    const target = this.resolve(filename);
    if (!target) {
      throw new CatalogError(`Refusing media path outside ${this.mediaDir}: ${filename}`);
    }

    if (!(await exists(target))) {
      await fs.writeFile(target, placeholderSvg(entry.label), 'utf8');
      log.info(`Created placeholder image: ${target}`);
    }

    const created: MediaEntry = { id, label: entry.label, path: filename };
    this.ads.push(created);
    await this.save();
    return { ...created };
  }

  async remove(id: number): Promise<boolean> {
    const target = this.ads.find((ad) => ad.id === id);
    if (!target) {
      return false;
    }

    const shared = this.ads.some((ad) => ad.id !== id && ad.path === target.path);
    const file = target.path !== null ? this.resolve(target.path) : null;
    if (file && !shared && (await exists(file))) {
      try {
        await fs.unlink(file);
        log.info(`Removed ad file: ${target.path}`);
      } catch (error) {
        log.error(`Failed to remove ad file: ${target.path}`, error);
      }
    }

    this.ads = this.ads.filter((ad) => ad.id !== id);
    await this.save();
    return true;
  }

  /** Bytes of a media file, or null when missing or outside the media dir. */
  async readMedia(filename: string): Promise<Buffer | null> {
    const file = this.resolve(filename);
    if (!file) {
      log.warn(`Rejected media request outside the media directory: ${filename}`);
      return null;
    }
    try {
      const stat = await fs.stat(file);
      if (!stat.isFile()) return null;
      return await fs.readFile(file);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  private resolve(filename: string): string | null {
    const root = path.resolve(this.mediaDir);
    const file = path.resolve(root, filename);
    return path.dirname(file) === root ? file : null;
  }

  private async listMediaFiles(): Promise<string[]> {
    const dirents = await fs.readdir(this.mediaDir, { withFileTypes: true });
    return dirents.filter((d) => d.isFile() && isMediaFile(d.name)).map((d) => d.name);
  }
}

function sameSet<T>(a: Set<T>, b: Set<T>): boolean {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}
