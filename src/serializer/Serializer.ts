import { SerializerError } from '../common/errors';
import concatArrays from '../common/concatArrays';

export type SerializerName = 'marshal' | 'json' | 'utf8' | 'pair';

export type SerializerDescriptor =
  | {
      name: 'marshal' | 'json' | 'utf8';
      batchSize: number;
    }
  | {
      name: 'pair';
      batchSize: number;
      key: SerializerDescriptor;
      value: SerializerDescriptor;
    };

export function writeFrame(payload: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeInt32LE(payload.length, 0);
  return Buffer.concat([length, payload]);
}

export function readFrames(buf: Buffer): Buffer[] {
  const ret: Buffer[] = [];
  for (let index = 0; index < buf.length; ) {
    if (index + 4 > buf.length) {
      throw new SerializerError(`Truncated frame header at byte ${index}`);
    }
    const length = buf.readInt32LE(index);
    const end = index + 4 + length;
    if (length < 0 || end > buf.length) {
      throw new SerializerError(
        `Truncated frame at byte ${index}: expected ${length} bytes`,
      );
    }
    ret.push(buf.subarray(index + 4, end));
    index = end;
  }
  return ret;
}

export function sameDescriptor(
  a: SerializerDescriptor,
  b: SerializerDescriptor,
): boolean {
  if (a.name !== b.name || a.batchSize !== b.batchSize) {
    return false;
  }
  if (a.name === 'pair' && b.name === 'pair') {
    return sameDescriptor(a.key, b.key) && sameDescriptor(a.value, b.value);
  }
  return true;
}

export function describe(d: SerializerDescriptor): string {
  if (d.name === 'pair') {
    return `pair(${describe(d.key)}, ${describe(d.value)})[${d.batchSize}]`;
  }
  return `${d.name}[${d.batchSize}]`;
}

/**
 * Codec between a sequence of values and a stream of length-prefixed
 * frames, each frame carrying one batch of at most `batchSize` items.
 *
 * The bytes carry no type information: only a serializer whose descriptor
 * equals the encoder's can read them back.
 */
export abstract class Serializer<T = unknown> {
  readonly batchSize: number;

  constructor(batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new SerializerError(
        `Batch size must be a positive integer, got ${batchSize}`,
      );
    }
    this.batchSize = batchSize;
  }

  abstract descriptor(): SerializerDescriptor;
  abstract dumpBatch(items: T[]): Buffer;
  abstract loadBatch(payload: Buffer): T[];

  *batches(items: Iterable<T>): Generator<Buffer> {
    let batch: T[] = [];
    for (const item of items) {
      batch.push(item);
      if (batch.length >= this.batchSize) {
        yield writeFrame(this.dumpBatch(batch));
        batch = [];
      }
    }
    if (batch.length > 0) {
      yield writeFrame(this.dumpBatch(batch));
    }
  }

  dump(items: Iterable<T>): Buffer {
    return Buffer.concat([...this.batches(items)]);
  }

  load(data: Buffer): T[] {
    return concatArrays(readFrames(data).map(v => this.loadBatch(v)));
  }

  sameAs(other: Serializer<unknown>): boolean {
    return sameDescriptor(this.descriptor(), other.descriptor());
  }

  toString(): string {
    return describe(this.descriptor());
  }
}
