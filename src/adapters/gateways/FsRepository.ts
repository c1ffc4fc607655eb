import * as fs from 'fs/promises';
import * as path from 'path';
import { Readable } from 'stream';
import { IFileRepository } from '../../usecases/ports/IFileRepository';
import { throwIfCancelled } from '../../utils/cancellation';

const SKIPPED_DIRECTORIES = new Set(['.git', '.hg', '.svn']);

function isMissingPath(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

export class FsRepository implements IFileRepository {
  async *walk(root: string, signal?: AbortSignal): AsyncIterable<string> {
    yield* this.walkDirectory(root, '', signal);
  }

  async isFile(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (error) {
      if (isMissingPath(error)) {
        return false;
      }
      throw error;
    }
  }

  async openRead(filePath: string): Promise<Readable> {
    const handle = await fs.open(filePath, 'r');
    return handle.createReadStream();
  }

  private async *walkDirectory(
    dir: string,
    prefix: string,
    signal?: AbortSignal,
  ): AsyncGenerator<string> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      throwIfCancelled(signal, `walking ${dir}`);

      const relativePath = prefix === '' ? entry.name : `${prefix}/${entry.name}`;
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) {
          yield* this.walkDirectory(path.join(dir, entry.name), relativePath, signal);
        }
      } else if (entry.isFile()) {
        yield relativePath;
      }
    }
  }
}
