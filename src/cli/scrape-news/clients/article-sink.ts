import type { Batch, SelectorResolution } from "../types/schemas";

export type SinkContext = {
  url: string;
  resolution: SelectorResolution;
  ingestedAt: string;
};

/**
 * Destination for a completed batch. Called once per run with the whole
 * batch; a thrown error is recorded against this sink only.
 */
export type ArticleSink = {
  readonly name: string;
  write(batch: Batch, context: SinkContext): Promise<void>;
};

/**
 * A batch could not be written to its destination.
 */
export class PersistenceFailure extends Error {
  readonly sink: string;

  constructor(sink: string, message: string, options?: { cause?: unknown }) {
    super(`${sink}: ${message}`, options);
    this.name = "PersistenceFailure";
    this.sink = sink;
  }
}
