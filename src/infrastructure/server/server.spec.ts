import { FastifyInstance } from 'fastify';
import { Readable } from 'stream';
import { SourceController } from '../../adapters/controllers/SourceController';
import { PathSpecResolver } from '../../domain/PathSpecResolver';
import { ResolveSourceUseCase } from '../../usecases/ResolveSourceUseCase';
import { RetrieveSourceUseCase } from '../../usecases/RetrieveSourceUseCase';
import { createServer } from './server';

describe('createServer', () => {
  let server: FastifyInstance;
  let mockRetrieveSourceUC: jest.Mocked<RetrieveSourceUseCase>;

  beforeEach(() => {
    mockRetrieveSourceUC = { execute: jest.fn() } as unknown as jest.Mocked<RetrieveSourceUseCase>;
    const controller = new SourceController(
      mockRetrieveSourceUC,
      new ResolveSourceUseCase(new PathSpecResolver()),
    );
    server = createServer(controller);
  });

  afterEach(async () => {
    await server.close();
  });

  it('should report health', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('should reject a source request without a path', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/source/go',
      query: { function: 'runtime.gopark' },
    });
    expect(response.statusCode).toBe(400);
    expect(mockRetrieveSourceUC.execute).not.toHaveBeenCalled();
  });

  it('should serve the file body with its location', async () => {
    mockRetrieveSourceUC.execute.mockResolvedValue({
      location: {
        repository: 'github.com/felixge/httpsnoop',
        revision: 'v1.0.3',
        relativePath: 'capture_metrics.go',
      },
      repository: 'github.com/felixge/httpsnoop',
      revision: 'v1.0.3',
      relativePath: 'capture_metrics.go',
      filePath: '/data/go-mod-cache/github.com/felixge/httpsnoop@v1.0.3/capture_metrics.go',
      content: Readable.from([Buffer.from('package httpsnoop\n')]),
    });

    const response = await server.inject({
      method: 'GET',
      url: '/source/go',
      query: {
        function: 'github.com/felixge/httpsnoop.(*Metrics).CaptureMetrics',
        path: '/home/runner/go/pkg/mod/github.com/felixge/httpsnoop@v1.0.3/capture_metrics.go',
      },
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('package httpsnoop\n');
    expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(response.headers['x-source-repository']).toBe('github.com/felixge/httpsnoop');
    expect(response.headers['x-source-revision']).toBe('v1.0.3');
  });

  it('should resolve a location without fetching it', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/resolve',
      query: { path: 'github.com/aws/aws-sdk-go@v1.44.163/aws/endpoints/defaults.go' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      location: {
        repository: 'github.com/aws/aws-sdk-go',
        revision: 'v1.44.163',
        relativePath: 'aws/endpoints/defaults.go',
      },
    });
  });

  it('should answer 400 when a symbol is needed', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/resolve',
      query: { path: 'some/bare/relative/path.go' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'cannot resolve path' });
  });
});
