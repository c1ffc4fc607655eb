import { FastifyInstance } from 'fastify';
import * as portfinder from 'portfinder';
import { SourceController } from './adapters/controllers/SourceController';
import { FsRepository } from './adapters/gateways/FsRepository';
import { GoModuleMaterializer } from './adapters/gateways/GoModuleMaterializer';
import { GoRootProvider } from './adapters/gateways/GoRootProvider';
import { AppConfig } from './config';
import { PathSpecResolver } from './domain/PathSpecResolver';
import { GoCommand, goEnvironment } from './infrastructure/go/GoCommand';
import { createServer } from './infrastructure/server/server';
import { FileLocator } from './usecases/FileLocator';
import { ResolveSourceUseCase } from './usecases/ResolveSourceUseCase';
import { RetrieveSourceUseCase } from './usecases/RetrieveSourceUseCase';

export function buildApp(config: AppConfig): FastifyInstance {
  // 1. Infrastructure (Drivers)
  const go = new GoCommand(config.goBinary, goEnvironment(config));

  // 2. Adapters (Interface Adapters)
  const fsRepo = new FsRepository();
  const materializer = new GoModuleMaterializer(go);
  const rootProvider = new GoRootProvider(go, config.goRoot);

  // 3. UseCases (Application Business Rules)
  const resolver = new PathSpecResolver();
  const retrieveSourceUC = new RetrieveSourceUseCase(
    resolver,
    materializer,
    rootProvider,
    new FileLocator(fsRepo),
    fsRepo,
    config.defaultRevision,
  );
  const resolveSourceUC = new ResolveSourceUseCase(resolver);

  // 4. Controllers
  const controller = new SourceController(retrieveSourceUC, resolveSourceUC);

  // 5. Server
  return createServer(controller, { logger: true });
}

export async function startServer(config: AppConfig): Promise<FastifyInstance> {
  const server = buildApp(config);

  // The configured port is the first one tried
  const port = await portfinder.getPortPromise({ port: config.port, host: config.host });
  if (port !== config.port) {
    console.warn(`Port ${config.port} is busy, using ${port} instead.`);
  }

  await server.listen({ port, host: config.host });
  console.log(`Serving sources from ${config.dataDir} on http://${config.host}:${port}`);

  const shutdown = () => {
    console.log('Shutting down...');
    void server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Failed to shut down cleanly:', error);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return server;
}
