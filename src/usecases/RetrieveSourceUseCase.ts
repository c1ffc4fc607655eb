import * as path from 'path';
import { Readable } from 'stream';
import { SourceFile, SourceLocation } from '../domain/entities';
import { IOError } from '../domain/errors';
import { PathSpecResolver } from '../domain/PathSpecResolver';
import { throwIfCancelled } from '../utils/cancellation';
import { FileLocator } from './FileLocator';
import { IFileRepository } from './ports/IFileRepository';
import { IModuleMaterializer } from './ports/IModuleMaterializer';
import { IStandardLibraryRootProvider } from './ports/IStandardLibraryRootProvider';
import { OperationContext } from './ports/OperationContext';

export interface SourceRequest {
  symbol?: string;
  repository?: string;
  revision?: string;
  path: string;
}

interface SourceRoot {
  directory: string;
  repository: string;
  revision: string;
}

export class RetrieveSourceUseCase {
  constructor(
    private readonly resolver: PathSpecResolver,
    private readonly materializer: IModuleMaterializer,
    private readonly stdlibRoot: IStandardLibraryRootProvider,
    private readonly locator: FileLocator,
    private readonly fileRepo: IFileRepository,
    private readonly defaultRevision: string = 'latest',
  ) {}

  async execute(request: SourceRequest, ctx: OperationContext = {}): Promise<SourceFile> {
    const location = this.toLocation(request);
    ctx.log?.info({ ...location }, 'resolved source location');

    const root = await this.materializeRoot(location, request.revision, ctx);
    const relativePath = await this.findFile(root.directory, location, request.path, ctx);

    throwIfCancelled(ctx.signal, `reading ${relativePath}`);
    const filePath = path.join(root.directory, relativePath);
    let content: Readable;
    try {
      content = await this.fileRepo.openRead(filePath);
    } catch (error) {
      throw new IOError(filePath, { cause: error });
    }

    return {
      location,
      repository: root.repository,
      revision: root.revision,
      relativePath,
      filePath,
      content,
    };
  }

  private toLocation(request: SourceRequest): SourceLocation {
    if (request.repository) {
      return {
        repository: request.repository,
        revision: request.revision ?? '',
        relativePath: request.path.replace(/^\/+/, ''),
      };
    }
    return this.resolver.resolve(request.symbol ?? '', request.path);
  }

  private async materializeRoot(
    location: SourceLocation,
    requestedRevision: string | undefined,
    ctx: OperationContext,
  ): Promise<SourceRoot> {
    if (location.repository === '') {
      const directory = await this.stdlibRoot.root(ctx);
      return { directory, repository: '', revision: '' };
    }

    // a revision recorded in the path beats the caller's
    const revision = location.revision || requestedRevision || this.defaultRevision;
    const snapshot = await this.materializer.materialize(location.repository, revision, ctx);
    return {
      directory: snapshot.directory,
      repository: snapshot.repository,
      revision: snapshot.revision,
    };
  }

  private async findFile(
    root: string,
    location: SourceLocation,
    recordedPath: string,
    ctx: OperationContext,
  ): Promise<string> {
    const direct = path.resolve(root, location.relativePath);
    const relative = path.relative(root, direct);
    const insideRoot =
      relative !== '' && relative.split(path.sep)[0] !== '..' && !path.isAbsolute(relative);

    if (insideRoot && (await this.fileRepo.isFile(direct))) {
      return relative.split(path.sep).join('/');
    }

    ctx.log?.info({ root, recordedPath }, 'no exact match, searching by path suffix');
    return this.locator.locate(root, recordedPath, ctx.signal);
  }
}
