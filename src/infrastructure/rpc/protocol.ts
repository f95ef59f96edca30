import * as rpc from 'vscode-jsonrpc/node';
import * as lsp from 'vscode-languageserver-protocol';
import { SemanticHighlightingInformation } from '../../domain/entities';

export interface SemanticHighlightingParams {
  textDocument: lsp.VersionedTextDocumentIdentifier;
  lines: SemanticHighlightingInformation[];
}

export interface DidUpdateTreeParams {
  textDocument: lsp.VersionedTextDocumentIdentifier;
  // Resolved-tree JSON for this version of the document
  treePath: string;
}

export const SemanticHighlightingNotification = new rpc.NotificationType<SemanticHighlightingParams>(
  'textDocument/semanticHighlighting',
);

export const DidUpdateTreeNotification = new rpc.NotificationType<DidUpdateTreeParams>(
  'semanticHighlighting/didUpdate',
);

export const DidCloseNotification = new rpc.NotificationType<lsp.DidCloseTextDocumentParams>(
  'semanticHighlighting/didClose',
);

export const ScopesRequest = new rpc.RequestType0<string[][], void>('semanticHighlighting/scopes');
