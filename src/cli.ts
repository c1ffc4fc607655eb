#!/usr/bin/env node
import axios from 'axios';
import cac from 'cac';
import { CliPresenter } from './adapters/presenters/CliPresenter';
import { loadConfig } from './config';
import { PathSpecResolver } from './domain/PathSpecResolver';
import { startServer } from './main';
import { ResolveSourceUseCase } from './usecases/ResolveSourceUseCase';

interface ServeOptions {
  dataDir?: string;
  port?: string | number;
  host?: string;
  go?: string;
  goroot?: string;
  goproxy?: string;
}

interface ResolveOptions {
  function?: string;
  table?: boolean;
}

interface FetchOptions {
  function?: string;
  repository?: string;
  revision?: string;
  url: string;
}

const cli = cac('go-source-server');
const presenter = new CliPresenter();

function handleError(error: unknown) {
  if (axios.isAxiosError(error) && error.response) {
    presenter.presentError(`${error.response.status} - ${String(error.response.data)}`);
  } else if (error instanceof Error) {
    presenter.presentError(error.message);
  } else {
    presenter.presentError('Unknown error occurred');
  }
  process.exit(1);
}

cli
  .command('serve', 'Serve source files over HTTP')
  .option('--data-dir <dir>', 'Data dir for the module cache')
  .option('--port <port>', 'Port to listen on')
  .option('--host <host>', 'Address to bind')
  .option('--go <binary>', 'Go binary to run')
  .option('--goroot <dir>', 'Toolchain root holding the standard library sources')
  .option('--goproxy <url>', 'GOPROXY to download modules through')
  .action(async (options: ServeOptions) => {
    try {
      const config = loadConfig({
        dataDir: options.dataDir,
        port: options.port,
        host: options.host,
        goBinary: options.go,
        goRoot: options.goroot,
        goProxy: options.goproxy,
      });
      await startServer(config);
    } catch (error) {
      handleError(error);
    }
  });

cli
  .command('resolve <path>', 'Show which repository, revision and file a recorded path maps to')
  .option('--function <symbol>', 'Function symbol the path was recorded for')
  .option('--table', 'Output in table format')
  .action((path: string, options: ResolveOptions) => {
    try {
      const useCase = new ResolveSourceUseCase(new PathSpecResolver());
      presenter.presentLocation(useCase.execute(options.function, path), options);
    } catch (error) {
      handleError(error);
    }
  });

cli
  .command('fetch <path>', 'Print a source file served by a running server')
  .option('--function <symbol>', 'Function symbol the path was recorded for')
  .option('--repository <repo>', 'Repository to read from instead of resolving the symbol')
  .option('--revision <rev>', 'Revision to read when the path carries none')
  .option('--url <url>', 'Server address', { default: 'http://127.0.0.1:8090' })
  .action(async (path: string, options: FetchOptions) => {
    try {
      const response = await axios.get<string>(`${options.url}/source/go`, {
        params: {
          path,
          function: options.function,
          repository: options.repository,
          revision: options.revision,
        },
        responseType: 'text',
      });
      process.stdout.write(response.data);
    } catch (error) {
      handleError(error);
    }
  });

cli.help();
cli.version('0.1.0');

cli.parse();
