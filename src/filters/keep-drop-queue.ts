/**
 * KeepDropQueue
 *
 * Deterministic keep/drop gate. The pattern alternates between keeping and
 * dropping runs of packets, starting with a keep run, and repeats once the
 * end is reached. A negative entry means "this run never ends".
 *
 *   [2, 1, 3]      keep 2, drop 1, keep 3, drop 2, keep 1, drop 3, ...
 *   [2, 1, 1, -1]  keep 2, drop 1, keep 1, then drop everything
 */

import { defaultChunkClassifier, type ChunkClassifier } from '../codec/classifier.js';
import { ConfigurationError } from '../errors.js';
import { Filter, type SendFn } from './filter.js';

export type Segment =
  | { kind: 'finite'; count: number }
  | { kind: 'forever' };

export type KeepDropMode = 'keep' | 'drop';

export interface KeepDropQueueOptions {
  pattern: readonly number[];
  /** Count (and gate) only packets that are transfer chunks */
  onlyConsiderTransferChunks?: boolean;
  classifier?: ChunkClassifier;
}

/**
 * Convert a numeric pattern into segments. Any negative entry is the
 * terminal `forever` segment.
 *
 * @throws ConfigurationError for an empty pattern, non-integers, or a
 * pattern made only of zero-length runs
 */
export function parseKeepDropPattern(pattern: readonly number[]): Segment[] {
  if (pattern.length === 0) {
    throw new ConfigurationError('KeepDropQueue: pattern must not be empty');
  }

  const segments = pattern.map((value, index): Segment => {
    if (!Number.isInteger(value)) {
      throw new ConfigurationError(`KeepDropQueue: pattern[${index}] must be an integer, got ${value}`, undefined, {
        index,
        value,
      });
    }
    return value < 0 ? { kind: 'forever' } : { kind: 'finite', count: value };
  });

  if (segments.every((segment) => segment.kind === 'finite' && segment.count === 0)) {
    throw new ConfigurationError('KeepDropQueue: pattern must contain a non-zero run');
  }
  return segments;
}

export class KeepDropQueue extends Filter {
  private readonly segments: readonly Segment[];
  private readonly onlyConsiderTransferChunks: boolean;
  private readonly classifier: ChunkClassifier;
  private segmentIndex = 0;
  private remaining: number;
  private keep = true;

  constructor(send: SendFn, name: string, options: KeepDropQueueOptions) {
    super(send, name);
    this.segments = parseKeepDropPattern(options.pattern);
    this.onlyConsiderTransferChunks = options.onlyConsiderTransferChunks ?? false;
    this.classifier = options.classifier ?? defaultChunkClassifier;
    this.remaining = this.segmentLength(0);
  }

  get mode(): KeepDropMode {
    return this.keep ? 'keep' : 'drop';
  }

  async process(packet: Uint8Array): Promise<void> {
    if (this.onlyConsiderTransferChunks && !this.classifier.classify(packet)) {
      await this.send(packet);
      return;
    }

    // A forever segment has an infinite run, so this never advances past it.
    while (this.remaining === 0) {
      this.advance();
    }
    this.remaining--;

    if (this.keep) {
      await this.forward(packet);
    } else {
      this.drop(packet);
    }
  }

  private segmentLength(index: number): number {
    const segment = this.segments[index];
    return segment?.kind === 'finite' ? segment.count : Infinity;
  }

  private advance(): void {
    this.segmentIndex = (this.segmentIndex + 1) % this.segments.length;
    this.remaining = this.segmentLength(this.segmentIndex);
    this.keep = !this.keep;
  }
}
