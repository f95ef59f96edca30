import * as rpc from 'vscode-jsonrpc/node';
import * as lsp from 'vscode-languageserver-protocol';
import { DocumentNotOpenError } from '../../domain/errors';
import { CloseDocumentUseCase } from '../../usecases/CloseDocumentUseCase';
import { GetScopesUseCase } from '../../usecases/GetScopesUseCase';
import { HighlightDocumentUseCase } from '../../usecases/HighlightDocumentUseCase';
import {
  DidCloseNotification,
  DidUpdateTreeNotification,
  DidUpdateTreeParams,
  ScopesRequest,
} from './protocol';

/**
 * Serves highlighting over a JSON-RPC connection: the client announces new
 * resolved trees, the server answers with textDocument/semanticHighlighting
 * notifications carrying the changed lines. The notifications are sent by the
 * publisher given to the highlight use case.
 */
export class RpcServer {
  constructor(
    private readonly connection: rpc.MessageConnection,
    private readonly highlightDocumentUC: HighlightDocumentUseCase,
    private readonly closeDocumentUC: CloseDocumentUseCase,
    private readonly getScopesUC: GetScopesUseCase,
  ) {}

  listen(): void {
    this.connection.onNotification(DidUpdateTreeNotification, (params) => this.didUpdate(params));
    this.connection.onNotification(DidCloseNotification, (params) => this.didClose(params));
    this.connection.onRequest(ScopesRequest, () => this.getScopesUC.execute().scopes);
    this.connection.listen();
  }

  private async didUpdate(params: DidUpdateTreeParams): Promise<void> {
    const { uri, version } = params.textDocument;
    try {
      await this.highlightDocumentUC.execute({
        uri,
        version,
        treePath: params.treePath,
      });
    } catch (error) {
      console.error(`Failed to highlight ${uri}@${version}:`, error);
    }
  }

  private async didClose(params: lsp.DidCloseTextDocumentParams): Promise<void> {
    const { uri } = params.textDocument;
    try {
      await this.closeDocumentUC.execute(uri);
    } catch (error) {
      if (error instanceof DocumentNotOpenError) {
        console.warn(error.message);
        return;
      }
      console.error(`Failed to close ${uri}:`, error);
    }
  }
}
