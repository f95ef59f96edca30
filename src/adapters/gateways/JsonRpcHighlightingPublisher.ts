import * as rpc from 'vscode-jsonrpc/node';
import { HighlightResult } from '../../domain/entities';
import { SemanticHighlightingNotification } from '../../infrastructure/rpc/protocol';
import { IHighlightingPublisher } from '../../usecases/ports/IHighlightingPublisher';

export class JsonRpcHighlightingPublisher implements IHighlightingPublisher {
  constructor(private readonly connection: rpc.MessageConnection) {}

  async publish(result: HighlightResult): Promise<void> {
    await this.connection.sendNotification(SemanticHighlightingNotification, {
      textDocument: { uri: result.uri, version: result.version },
      lines: result.lines,
    });
  }
}
