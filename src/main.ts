import cac from 'cac';
import * as fs from 'fs/promises';
import * as portfinder from 'portfinder';
import * as rpc from 'vscode-jsonrpc/node';
import { HighlightingController } from './adapters/controllers/HighlightingController';
import { FsRepository } from './adapters/gateways/FsRepository';
import { InMemorySnapshotStore } from './adapters/gateways/InMemorySnapshotStore';
import { JsonRpcHighlightingPublisher } from './adapters/gateways/JsonRpcHighlightingPublisher';
import { JsonTreeRepository } from './adapters/gateways/JsonTreeRepository';
import { RpcServer } from './infrastructure/rpc/RpcServer';
import { createServer } from './infrastructure/server/server';
import { CloseDocumentUseCase } from './usecases/CloseDocumentUseCase';
import { CollectTokensUseCase } from './usecases/CollectTokensUseCase';
import { DocumentQueue } from './usecases/DocumentQueue';
import { GetScopesUseCase } from './usecases/GetScopesUseCase';
import { HighlightDocumentUseCase } from './usecases/HighlightDocumentUseCase';
import { IHighlightingPublisher } from './usecases/ports/IHighlightingPublisher';
import { getDaemonFilePath } from './utils/daemon';

const BASE_PORT = 30000;

const args = cac('semhl-daemon')
  .option('--stdio', 'Serve JSON-RPC over stdin/stdout instead of HTTP')
  .option('--port <port>', 'First port to try', { default: BASE_PORT })
  .parse();

function createUseCases(publisher?: IHighlightingPublisher) {
  // 1. Adapters (Interface Adapters)
  const treeRepo = new JsonTreeRepository(new FsRepository());
  const snapshots = new InMemorySnapshotStore();
  const queue = new DocumentQueue();

  // 2. UseCases (Application Business Rules)
  return {
    collectTokensUC: new CollectTokensUseCase(treeRepo),
    highlightDocumentUC: new HighlightDocumentUseCase(treeRepo, snapshots, queue, publisher),
    closeDocumentUC: new CloseDocumentUseCase(snapshots, queue),
    getScopesUC: new GetScopesUseCase(),
  };
}

function serveStdio() {
  // stdout carries the JSON-RPC stream.
  console.log = console.error.bind(console);

  const connection = rpc.createMessageConnection(
    new rpc.StreamMessageReader(process.stdin),
    new rpc.StreamMessageWriter(process.stdout),
  );
  const { highlightDocumentUC, closeDocumentUC, getScopesUC } = createUseCases(
    new JsonRpcHighlightingPublisher(connection),
  );

  connection.onClose(() => process.exit(0));
  new RpcServer(connection, highlightDocumentUC, closeDocumentUC, getScopesUC).listen();
  console.log('Serving semantic highlighting over stdio.');
}

async function bootstrap() {
  const daemonFile = getDaemonFilePath(process.cwd());
  try {
    const useCases = createUseCases();

    // 3. Controllers
    const controller = new HighlightingController(
      useCases.collectTokensUC,
      useCases.highlightDocumentUC,
      useCases.closeDocumentUC,
      useCases.getScopesUC,
    );

    // 4. Server
    const server = createServer(controller);

    // Find a free port
    const port = await portfinder.getPortPromise({ port: Number(args.options.port) });

    await server.listen({ port, host: '127.0.0.1' });
    console.log(`Server listening on http://localhost:${port}`);

    // Write daemon info
    const daemonInfo = { port, pid: process.pid };
    await fs.writeFile(daemonFile, JSON.stringify(daemonInfo));

    // Remove the daemon file on exit
    const shutdown = async () => {
      console.log('Shutting down...');
      try {
        await fs.unlink(daemonFile);
      } catch {
        // Ignore if file already gone
      }
      await server.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

if (args.options.stdio) {
  serveStdio();
} else {
  void bootstrap();
}
