import { ModuleSnapshot } from '../../domain/entities';
import { CancelledError, MaterializationError } from '../../domain/errors';
import { GoCommand, GoCommandResult } from '../../infrastructure/go/GoCommand';
import { IModuleMaterializer } from '../../usecases/ports/IModuleMaterializer';
import { OperationContext } from '../../usecases/ports/OperationContext';

/** The fields of `go mod download -json` this adapter reads. */
export interface ModuleDownloadInfo {
  Path?: string;
  Version?: string;
  Error?: string;
  Dir?: string;
  Zip?: string;
  Sum?: string;
}

const STRING_FIELDS = ['Path', 'Version', 'Error', 'Dir', 'Zip', 'Sum'] as const;

function isModuleDownloadInfo(value: unknown): value is ModuleDownloadInfo {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return STRING_FIELDS.every(
    (field) => record[field] === undefined || typeof record[field] === 'string',
  );
}

export function parseModuleDownloadInfo(stdout: string): ModuleDownloadInfo | undefined {
  if (stdout.trim() === '') {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return undefined;
  }
  return isModuleDownloadInfo(parsed) ? parsed : undefined;
}

/**
 * Downloads a module revision into the module cache and reports where it was
 * extracted. Concurrent downloads of the same module are serialized by the go
 * tool's own cache locking.
 */
export class GoModuleMaterializer implements IModuleMaterializer {
  constructor(private readonly go: GoCommand) {}

  async materialize(
    repository: string,
    revision: string,
    ctx: OperationContext = {},
  ): Promise<ModuleSnapshot> {
    // anything starting with "-" would be read as a go flag
    if (repository.startsWith('-') || revision.startsWith('-')) {
      throw new MaterializationError(repository, revision, 'not a module path and version');
    }

    const args = ['mod', 'download', '-json', `${repository}@${revision}`];
    ctx.log?.info({ cmd: [this.go.binary, ...args] }, 'running command');

    let result: GoCommandResult;
    try {
      result = await this.go.run(args, ctx.signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new MaterializationError(repository, revision, detail, { cause: error });
    }

    const info = parseModuleDownloadInfo(result.stdout);
    if (result.code !== 0) {
      const detail = info?.Error || result.stderr.trim() || `exited with code ${result.code}`;
      throw new MaterializationError(repository, revision, detail);
    }
    if (!info) {
      throw new MaterializationError(repository, revision, 'unreadable download report');
    }
    if (info.Error) {
      throw new MaterializationError(repository, revision, info.Error);
    }
    if (!info.Dir) {
      throw new MaterializationError(repository, revision, 'download report names no directory');
    }

    ctx.log?.info(
      { repo: info.Path, 'local-path': info.Dir, version: info.Version },
      'found go module',
    );

    return {
      directory: info.Dir,
      repository: info.Path || repository,
      revision: info.Version || revision,
    };
  }
}
