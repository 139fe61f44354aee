import { Serializer, SerializerDescriptor, readFrames, writeFrame } from './Serializer';
import { SerializerError } from '../common/errors';

/**
 * Key/value records. Each batch is written as two inner frames: the keys
 * encoded by `key`, then the values encoded by `value`.
 */
export class PairSerializer<K = unknown, V = unknown> extends Serializer<
  [K, V]
> {
  readonly key: Serializer<K>;
  readonly value: Serializer<V>;

  constructor(batchSize: number, key: Serializer<K>, value: Serializer<V>) {
    super(batchSize);
    this.key = key;
    this.value = value;
  }

  descriptor(): SerializerDescriptor {
    return {
      name: 'pair',
      batchSize: this.batchSize,
      key: this.key.descriptor(),
      value: this.value.descriptor(),
    };
  }

  dumpBatch(items: [K, V][]): Buffer {
    const keys: K[] = [];
    const values: V[] = [];
    for (const item of items) {
      if (!Array.isArray(item) || item.length !== 2) {
        throw new SerializerError('pair serializer can only encode [key, value] tuples');
      }
      keys.push(item[0]);
      values.push(item[1]);
    }
    return Buffer.concat([
      writeFrame(this.key.dumpBatch(keys)),
      writeFrame(this.value.dumpBatch(values)),
    ]);
  }

  loadBatch(payload: Buffer): [K, V][] {
    const frames = readFrames(payload);
    if (frames.length !== 2) {
      throw new SerializerError(
        `Pair batch must hold 2 frames, found ${frames.length}`,
      );
    }
    const keys = this.key.loadBatch(frames[0]);
    const values = this.value.loadBatch(frames[1]);
    if (keys.length !== values.length) {
      throw new SerializerError(
        `Pair batch has ${keys.length} keys but ${values.length} values`,
      );
    }
    return keys.map((k, i): [K, V] => [k, values[i]]);
  }
}
