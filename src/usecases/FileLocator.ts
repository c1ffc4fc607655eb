import { NotFoundError } from '../domain/errors';
import { SuffixMatcher } from '../domain/SuffixMatcher';
import { IFileRepository } from './ports/IFileRepository';

/**
 * Finds the file under a materialized root that a recorded build path refers
 * to, when the path was recorded on another machine or under another layout.
 */
export class FileLocator {
  constructor(private readonly fileRepo: IFileRepository) {}

  async locate(root: string, recordedPath: string, signal?: AbortSignal): Promise<string> {
    const matcher = new SuffixMatcher(recordedPath);
    for await (const relativePath of this.fileRepo.walk(root, signal)) {
      matcher.offer(relativePath);
    }

    const match = matcher.match;
    if (match === undefined) {
      throw new NotFoundError(root, recordedPath);
    }
    return match;
  }
}
