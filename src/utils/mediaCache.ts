import fs from 'fs';
import path from 'path';
import { MediaCacheError } from '../../common/errors';

/** What the playback engine needs from local media storage. */
export interface MediaLibrary {
  has(filename: string): boolean;
  pathFor(filename: string): string;
  save(filename: string, base64Content: string): Promise<string>;
}

/**
 * Local mirror of the server's media directory, keyed by file name.
 */
export class MediaCache implements MediaLibrary {
  constructor(readonly dir: string) {
    fs.mkdirSync(dir, { recursive: true });
  }

  has(filename: string): boolean {
    try {
      return fs.statSync(this.pathFor(filename)).isFile();
    } catch (error) {
      if (error instanceof MediaCacheError) throw error;
      return false;
    }
  }

  pathFor(filename: string): string {
    if (
      filename.length === 0 ||
      filename !== path.basename(filename) ||
      filename.includes('\\') ||
      filename === '.' ||
      filename === '..'
    ) {
      throw new MediaCacheError(`Invalid media file name: ${filename}`);
    }
    return path.join(this.dir, filename);
  }

  async save(filename: string, base64Content: string): Promise<string> {
    const target = this.pathFor(filename);
    await fs.promises.writeFile(target, Buffer.from(base64Content, 'base64'));
    return target;
  }
}
