import * as cp from 'child_process';
import * as path from 'path';
import { AppConfig } from '../../config';
import { CancelledError } from '../../domain/errors';

export interface GoCommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/** Cache locations live under the data directory instead of the user's home. */
export function goEnvironment(config: AppConfig): Record<string, string> {
  const env: Record<string, string> = {
    GOPATH: path.join(config.dataDir, 'go-mod-cache'),
    GOMODCACHE: path.join(config.dataDir, 'go-mod-cache'),
    GOCACHE: path.join(config.dataDir, 'go-cache'),
  };
  if (config.goProxy) {
    env.GOPROXY = config.goProxy;
  }
  return env;
}

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
}

export class GoCommand {
  constructor(
    public readonly binary: string = 'go',
    private readonly env: Record<string, string> = {},
  ) {}

  /** Runs the go tool to completion. A non-zero exit is reported, not thrown. */
  run(args: string[], signal?: AbortSignal): Promise<GoCommandResult> {
    return new Promise((resolve, reject) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      const child = cp.spawn(this.binary, args, {
        env: { ...process.env, ...this.env },
        signal,
      });

      child.stdout?.on('data', (chunk: Buffer | string) => stdout.push(toBuffer(chunk)));
      child.stderr?.on('data', (chunk: Buffer | string) => stderr.push(toBuffer(chunk)));

      child.on('error', (error) => {
        if (signal?.aborted) {
          reject(new CancelledError(`${this.binary} ${args.join(' ')}`));
          return;
        }
        reject(error);
      });

      child.on('close', (code) => {
        resolve({
          code,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
        });
      });
    });
  }
}
