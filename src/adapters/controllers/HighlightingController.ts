import { FastifyReply, FastifyRequest } from 'fastify';
import {
  DocumentNotOpenError,
  InvalidTreeError,
  StaleVersionError,
  TreeNotFoundError,
} from '../../domain/errors';
import { CloseDocumentUseCase } from '../../usecases/CloseDocumentUseCase';
import { CollectTokensUseCase } from '../../usecases/CollectTokensUseCase';
import { GetScopesUseCase } from '../../usecases/GetScopesUseCase';
import { HighlightDocumentUseCase } from '../../usecases/HighlightDocumentUseCase';

export interface HighlightBody {
  uri: string;
  version: number;
  path: string;
}

export class HighlightingController {
  constructor(
    private readonly collectTokensUC: CollectTokensUseCase,
    private readonly highlightDocumentUC: HighlightDocumentUseCase,
    private readonly closeDocumentUC: CloseDocumentUseCase,
    private readonly getScopesUC: GetScopesUseCase,
  ) { }

  async tokens(req: FastifyRequest<{ Querystring: { path: string } }>, reply: FastifyReply) {
    const { path } = req.query;
    try {
      const result = await this.collectTokensUC.execute(path);
      return reply.send(result);
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  async highlight(req: FastifyRequest<{ Body: HighlightBody }>, reply: FastifyReply) {
    const { uri, version, path } = req.body;
    try {
      const result = await this.highlightDocumentUC.execute({ uri, version, treePath: path });
      return reply.send(result);
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  async close(req: FastifyRequest<{ Body: { uri: string } }>, reply: FastifyReply) {
    const { uri } = req.body;
    try {
      await this.closeDocumentUC.execute(uri);
      return reply.send({ uri, closed: true });
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  async scopes(_req: FastifyRequest, reply: FastifyReply) {
    return reply.send(this.getScopesUC.execute());
  }

  private handleError(error: unknown, reply: FastifyReply) {
    console.error(error);
    if (error instanceof TreeNotFoundError || error instanceof DocumentNotOpenError) {
      return reply.status(404).send({ error: error.message });
    }
    if (error instanceof StaleVersionError) {
      return reply.status(409).send({ error: error.message, currentVersion: error.currentVersion });
    }
    if (error instanceof InvalidTreeError) {
      return reply.status(400).send({ error: error.message });
    }
    return reply.status(500).send({ error: 'Internal Server Error' });
  }
}
