import { CancelledError, ToolchainError } from '../../domain/errors';
import { GoCommand } from '../../infrastructure/go/GoCommand';
import { GoRootProvider } from './GoRootProvider';

describe('GoRootProvider', () => {
  let mockGo: jest.Mocked<GoCommand>;

  beforeEach(() => {
    mockGo = { binary: 'go', run: jest.fn() } as unknown as jest.Mocked<GoCommand>;
  });

  it('should use a configured GOROOT without running go', async () => {
    const provider = new GoRootProvider(mockGo, '/opt/go');

    await expect(provider.root()).resolves.toBe('/opt/go/src');
    expect(mockGo.run).not.toHaveBeenCalled();
  });

  it('should ask go for GOROOT once', async () => {
    mockGo.run.mockResolvedValue({ code: 0, stdout: '/usr/local/go\n', stderr: '' });
    const provider = new GoRootProvider(mockGo);

    await expect(provider.root()).resolves.toBe('/usr/local/go/src');
    await expect(provider.root()).resolves.toBe('/usr/local/go/src');
    expect(mockGo.run).toHaveBeenCalledTimes(1);
    expect(mockGo.run).toHaveBeenCalledWith(['env', 'GOROOT']);
  });

  it('should retry after a failed lookup', async () => {
    mockGo.run
      .mockResolvedValueOnce({ code: 2, stdout: '', stderr: 'go: unknown command\n' })
      .mockResolvedValueOnce({ code: 0, stdout: '/usr/lib/go\n', stderr: '' });
    const provider = new GoRootProvider(mockGo);

    await expect(provider.root()).rejects.toThrow('go env GOROOT failed: go: unknown command');
    await expect(provider.root()).resolves.toBe('/usr/lib/go/src');
  });

  it('should wrap failures to start go', async () => {
    mockGo.run.mockRejectedValue(new Error('spawn go ENOENT'));

    await expect(new GoRootProvider(mockGo).root()).rejects.toThrow(ToolchainError);
  });

  it('should honor an aborted request', async () => {
    const abort = new AbortController();
    abort.abort();

    await expect(new GoRootProvider(mockGo, '/opt/go').root({ signal: abort.signal })).rejects.toThrow(
      CancelledError,
    );
  });
});
