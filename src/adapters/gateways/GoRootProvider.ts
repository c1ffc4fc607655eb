import * as path from 'path';
import { ToolchainError } from '../../domain/errors';
import { GoCommand, GoCommandResult } from '../../infrastructure/go/GoCommand';
import { IStandardLibraryRootProvider } from '../../usecases/ports/IStandardLibraryRootProvider';
import { OperationContext } from '../../usecases/ports/OperationContext';
import { throwIfCancelled } from '../../utils/cancellation';

export class GoRootProvider implements IStandardLibraryRootProvider {
  private goRoot: Promise<string> | null = null;

  constructor(
    private readonly go: GoCommand,
    private readonly configuredRoot?: string,
  ) {}

  async root(ctx: OperationContext = {}): Promise<string> {
    const goRoot = this.configuredRoot ?? (await this.discover(ctx));
    throwIfCancelled(ctx.signal, 'locating GOROOT');
    return path.join(goRoot, 'src');
  }

  // Shared between requests, so it does not take any one request's signal.
  private discover(ctx: OperationContext): Promise<string> {
    if (!this.goRoot) {
      ctx.log?.info({ cmd: [this.go.binary, 'env', 'GOROOT'] }, 'running command');
      this.goRoot = this.lookup().catch((error: unknown) => {
        this.goRoot = null;
        throw error;
      });
    }
    return this.goRoot;
  }

  private async lookup(): Promise<string> {
    const command = `${this.go.binary} env GOROOT`;
    let result: GoCommandResult;
    try {
      result = await this.go.run(['env', 'GOROOT']);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ToolchainError(command, detail, { cause: error });
    }

    const goRoot = result.stdout.trim();
    if (result.code !== 0 || goRoot === '') {
      throw new ToolchainError(command, result.stderr.trim() || `exited with code ${result.code}`);
    }
    return goRoot;
  }
}
