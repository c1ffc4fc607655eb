import dotenv from 'dotenv';
import * as path from 'path';

export interface AppConfig {
  dataDir: string; // absolute
  host: string;
  port: number;
  goBinary: string;
  goRoot?: string;
  goProxy?: string;
  defaultRevision: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, 'port'>> & { port?: number | string };

const DEFAULT_PORT = 8090;

function parsePort(value: number | string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  // ":8090" is accepted as well
  const port = typeof value === 'number' ? value : Number.parseInt(value.replace(/^:/, ''), 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Builds the server configuration. CLI flags win over environment variables,
 * which win over the defaults; `.env` in the working directory is honored.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  dotenv.config();

  const dataDir = overrides.dataDir ?? nonEmpty(env.SOURCE_SERVER_DATA_DIR) ?? './data';

  return {
    dataDir: path.resolve(dataDir),
    host: overrides.host ?? nonEmpty(env.SOURCE_SERVER_HOST) ?? '127.0.0.1',
    port: parsePort(overrides.port) ?? parsePort(env.SOURCE_SERVER_PORT) ?? DEFAULT_PORT,
    goBinary: overrides.goBinary ?? nonEmpty(env.SOURCE_SERVER_GO_BINARY) ?? 'go',
    goRoot: overrides.goRoot ?? nonEmpty(env.SOURCE_SERVER_GOROOT),
    goProxy: overrides.goProxy ?? nonEmpty(env.SOURCE_SERVER_GOPROXY),
    defaultRevision: overrides.defaultRevision ?? 'latest',
  };
}
