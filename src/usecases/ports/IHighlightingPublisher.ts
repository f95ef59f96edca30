import { HighlightResult } from '../../domain/entities';

export interface IHighlightingPublisher {
  publish(result: HighlightResult): Promise<void>;
}
