import process from "node:process";

export interface HelpSink {
  /** Throws when the destination rejects the chunk. */
  write(chunk: string): void;
}

export interface BufferSink extends HelpSink {
  readonly chunks: readonly string[];
  toString(): string;
}

/** The parts of a Node writable stream a stream sink relies on. */
export interface OutputStream {
  write(chunk: string): boolean;
  readonly destroyed?: boolean;
  readonly writableEnded?: boolean;
  readonly errored?: Error | null;
}

export class ClosedOutputStreamError extends Error {
  constructor() {
    super("Output stream is closed.");
    this.name = "ClosedOutputStreamError";
  }
}

/**
 * Writes to a Node stream. A stream records a failure reported by its
 * underlying write as `errored` before emitting `error`, so that failure is
 * thrown from `write` here.
 */
export function createStreamSink(
  stream: OutputStream = process.stderr,
): HelpSink {
  return {
    write: (chunk) => {
      if (stream.destroyed || stream.writableEnded) {
        throw new ClosedOutputStreamError();
      }
      stream.write(chunk);
      if (stream.errored) {
        throw stream.errored;
      }
    },
  };
}

export function createBufferSink(): BufferSink {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk) => {
      chunks.push(chunk);
    },
    toString: () => chunks.join(""),
  };
}
