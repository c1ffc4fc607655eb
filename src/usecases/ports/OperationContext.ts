import { ILogger } from './ILogger';

export interface OperationContext {
  signal?: AbortSignal;
  log?: ILogger;
}
