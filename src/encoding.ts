import { createReadStream, createWriteStream } from 'node:fs';
import { rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Transform, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { TextDecoder } from 'node:util';
import { EncodingError } from './errors.js';
import { ensureDir } from './utils/fs.js';

/** Creates a decoder that throws instead of substituting U+FFFD. */
export function createStrictDecoder(encoding: string, file?: string): TextDecoder {
  try {
    return new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    throw new EncodingError(`Unsupported encoding "${encoding}"`, { encoding, file }, { cause: error });
  }
}

export function decodeLegacyBytes(bytes: Uint8Array, encoding: string): string {
  const decoder = createStrictDecoder(encoding);
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new EncodingError(`Input is not valid ${encoding}`, { encoding, offset: 0 }, { cause: error });
  }
}

class Utf8Transcoder extends Transform {
  private readonly decoder: TextDecoder;
  private offset = 0;

  constructor(private readonly encoding: string, private readonly file: string) {
    super({ decodeStrings: true });
    this.decoder = createStrictDecoder(encoding, file);
  }

  private failure(error: unknown): EncodingError {
    return new EncodingError(
      `${this.file}: bytes near offset ${this.offset} are not valid ${this.encoding}`,
      { encoding: this.encoding, file: this.file, offset: this.offset },
      { cause: error }
    );
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    let text: string;
    try {
      text = this.decoder.decode(chunk, { stream: true });
    } catch (error) {
      callback(this.failure(error));
      return;
    }
    this.offset += chunk.length;
    callback(null, text);
  }

  _flush(callback: TransformCallback): void {
    let text: string;
    try {
      text = this.decoder.decode();
    } catch (error) {
      callback(this.failure(error));
      return;
    }
    callback(null, text);
  }

  get bytesRead(): number {
    return this.offset;
  }
}

/**
 * Streams `input` through a fatal decoder for `encoding` and writes UTF-8 to
 * `output`. On failure the partial output is removed and the
 * {@link EncodingError} propagates. Returns the number of bytes read.
 */
export async function normalizeEncoding(input: string, output: string, encoding: string): Promise<number> {
  const transcoder = new Utf8Transcoder(encoding, input);
  await ensureDir(dirname(output));

  try {
    await pipeline(createReadStream(input), transcoder, createWriteStream(output, { encoding: 'utf8' }));
  } catch (error) {
    await rm(output, { force: true });
    throw error;
  }

  return transcoder.bytesRead;
}
