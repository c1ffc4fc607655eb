import { FastifyBaseLogger, FastifyReply, FastifyRequest } from 'fastify';
import { AmbiguousInputError, CancelledError } from '../../domain/errors';
import { ResolveSourceUseCase } from '../../usecases/ResolveSourceUseCase';
import { RetrieveSourceUseCase } from '../../usecases/RetrieveSourceUseCase';

export interface SourceQuery {
  path: string;
  function?: string;
  symbol?: string;
  repository?: string;
  revision?: string;
}

export type ResolveQuery = Pick<SourceQuery, 'path' | 'function' | 'symbol'>;

// nginx's "client closed request"
const CLIENT_CLOSED_REQUEST = 499;

export class SourceController {
  constructor(
    private readonly retrieveSourceUC: RetrieveSourceUseCase,
    private readonly resolveSourceUC: ResolveSourceUseCase,
  ) {}

  async getSource(req: FastifyRequest<{ Querystring: SourceQuery }>, reply: FastifyReply) {
    const { path, repository, revision } = req.query;
    const abort = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) {
        abort.abort();
      }
    };
    reply.raw.once('close', onClose);

    try {
      const source = await this.retrieveSourceUC.execute(
        { symbol: this.symbolOf(req.query), repository, revision, path },
        { signal: abort.signal, log: req.log },
      );
      return reply
        .type('text/plain; charset=utf-8')
        .header('X-Source-Repository', source.repository)
        .header('X-Source-Revision', source.revision)
        .header('X-Source-Path', source.relativePath)
        .send(source.content);
    } catch (error) {
      reply.raw.off('close', onClose);
      return this.handleError(error, req.log, reply, 'error retrieving source code');
    }
  }

  async resolve(req: FastifyRequest<{ Querystring: ResolveQuery }>, reply: FastifyReply) {
    try {
      const location = this.resolveSourceUC.execute(this.symbolOf(req.query), req.query.path);
      return reply.send({ location });
    } catch (error) {
      return this.handleError(error, req.log, reply, 'error resolving import path');
    }
  }

  // `function` is what profilers send; `symbol` is accepted as an alias
  private symbolOf(query: ResolveQuery): string | undefined {
    return query.function || query.symbol;
  }

  private handleError(
    error: unknown,
    log: FastifyBaseLogger,
    reply: FastifyReply,
    message: string,
  ) {
    if (error instanceof CancelledError) {
      log.info({ err: error }, 'request cancelled by client');
      return reply.status(CLIENT_CLOSED_REQUEST).send({ error: 'request cancelled' });
    }
    log.error({ err: error }, message);
    if (error instanceof AmbiguousInputError) {
      return reply.status(400).send({ error: 'cannot resolve path' });
    }
    return reply.status(500).send({ error: message });
  }
}
