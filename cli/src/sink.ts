import { open, stat, type FileHandle } from "fs/promises";
import type { Writable } from "stream";
import { IOFailureError } from "./errors.js";

// =============================================================================
// Output Sinks
// =============================================================================

/**
 * Single writer for rendered combinations. Batches arrive in index order;
 * the separator goes between every two renderings, never after the last.
 */
export interface OutputSink {
  writeBatch(lines: readonly string[]): Promise<void>;
  close(): Promise<void>;
}

abstract class SeparatedSink implements OutputSink {
  /** Whether a separator is owed before the next rendering. */
  private owesSeparator: boolean;

  protected constructor(
    protected readonly separator: string,
    leadingSeparator: boolean
  ) {
    this.owesSeparator = leadingSeparator;
  }

  async writeBatch(lines: readonly string[]): Promise<void> {
    if (lines.length === 0) return;

    const body = lines.join(this.separator);
    await this.writeChunk(this.owesSeparator ? this.separator + body : body);
    this.owesSeparator = true;
  }

  protected abstract writeChunk(chunk: string): Promise<void>;

  abstract close(): Promise<void>;
}

// =============================================================================
// File Sink
// =============================================================================

export interface FileSinkOptions {
  append: boolean;
  separator: string;
}

export class FileSink extends SeparatedSink {
  private constructor(
    private readonly handle: FileHandle,
    readonly path: string,
    separator: string,
    leadingSeparator: boolean
  ) {
    super(separator, leadingSeparator);
  }

  /**
   * Open the destination, truncating it unless appending. When appending to
   * content that does not already end with the separator, the first
   * rendering is preceded by one separator.
   */
  static async open(path: string, options: FileSinkOptions): Promise<FileSink> {
    const leadingSeparator = options.append
      ? await endsWithoutSeparator(path, options.separator)
      : false;

    let handle: FileHandle;
    try {
      handle = await open(path, options.append ? "a" : "w");
    } catch (error) {
      throw new IOFailureError("open", path, error);
    }
    return new FileSink(handle, path, options.separator, leadingSeparator);
  }

  protected async writeChunk(chunk: string): Promise<void> {
    try {
      await this.handle.write(chunk, null, "utf8");
    } catch (error) {
      throw new IOFailureError("write", this.path, error);
    }
  }

  async close(): Promise<void> {
    try {
      await this.handle.close();
    } catch (error) {
      throw new IOFailureError("close", this.path, error);
    }
  }
}

async function endsWithoutSeparator(path: string, separator: string): Promise<boolean> {
  if (!separator) return false;

  let size: number;
  try {
    size = (await stat(path)).size;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw new IOFailureError("inspect", path, error);
  }
  if (size === 0) return false;

  const expected = Buffer.from(separator, "utf8");
  if (size < expected.length) return true;

  let handle: FileHandle | undefined;
  try {
    handle = await open(path, "r");
    const tail = Buffer.alloc(expected.length);
    await handle.read(tail, 0, expected.length, size - expected.length);
    return !tail.equals(expected);
  } catch (error) {
    throw new IOFailureError("read", path, error);
  } finally {
    await handle?.close();
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// =============================================================================
// Stream Sink
// =============================================================================

export interface StreamSinkOptions {
  separator: string;
  /** Name used in error messages. */
  name?: string;
}

/**
 * Writes to a stream the caller owns (stdout, a socket). close() does not
 * end the stream.
 */
export class StreamSink extends SeparatedSink {
  private readonly name: string;

  constructor(
    private readonly stream: Writable,
    options: StreamSinkOptions
  ) {
    super(options.separator, false);
    this.name = options.name ?? "stream";
  }

  protected writeChunk(chunk: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(chunk, "utf8", (error) => {
        if (error) {
          reject(new IOFailureError("write", this.name, error));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {}
}
