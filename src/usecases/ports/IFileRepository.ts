import { Readable } from 'stream';

export interface IFileRepository {
  /** Yields every regular file under `root` as a "/"-separated path relative to it. */
  walk(root: string, signal?: AbortSignal): AsyncIterable<string>;
  isFile(filePath: string): Promise<boolean>;
  openRead(filePath: string): Promise<Readable>;
}
