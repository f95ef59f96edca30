import { HighlightResult } from '../domain/entities';
import { diffHighlightings } from '../domain/diff';
import { toSemanticHighlightingInformation } from '../domain/encoding';
import { StaleVersionError } from '../domain/errors';
import { getSemanticHighlightings } from '../domain/TokenCollector';
import { reportDiagnostics } from '../utils/diagnostics';
import { DocumentQueue } from './DocumentQueue';
import { IHighlightingPublisher } from './ports/IHighlightingPublisher';
import { ISnapshotStore } from './ports/ISnapshotStore';
import { ITreeRepository } from './ports/ITreeRepository';

export interface HighlightRequest {
  uri: string;
  version: number;
  treePath: string;
}

export class HighlightDocumentUseCase {
  constructor(
    private readonly treeRepo: ITreeRepository,
    private readonly snapshots: ISnapshotStore,
    private readonly queue: DocumentQueue,
    private readonly publisher?: IHighlightingPublisher,
  ) {}

  /**
   * Highlights a new version of a document and returns only the lines that
   * changed since the previous version. Requests for the same document run
   * one at a time, in arrival order, and are ordered with closes of it.
   * Non-empty results go to the publisher, when there is one, before the
   * next request for the document starts.
   */
  async execute(request: HighlightRequest): Promise<HighlightResult> {
    return this.queue.run(request.uri, async () => {
      const result = await this.highlight(request);
      if (this.publisher && result.lines.length > 0) {
        await this.publisher.publish(result);
      }
      return result;
    });
  }

  private async highlight({ uri, version, treePath }: HighlightRequest): Promise<HighlightResult> {
    const current = this.snapshots.get(uri);
    if (current && version <= current.version) {
      throw new StaleVersionError(uri, version, current.version);
    }

    const tree = await this.treeRepo.load(treePath);
    const { tokens, diagnostics } = getSemanticHighlightings(tree);
    reportDiagnostics(diagnostics);

    const changed = diffHighlightings(tokens, current?.tokens ?? []);
    this.snapshots.set(uri, { version, tokens });

    return {
      uri,
      version,
      lines: toSemanticHighlightingInformation(changed),
      diagnostics: diagnostics.length,
    };
  }
}
