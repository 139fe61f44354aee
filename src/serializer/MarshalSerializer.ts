import * as v8 from 'v8';
import { Serializer, SerializerDescriptor } from './Serializer';
import { SerializerError } from '../common/errors';

// Structured clone through v8, the same format the engine uses internally.
export class MarshalSerializer<T = unknown> extends Serializer<T> {
  descriptor(): SerializerDescriptor {
    return { name: 'marshal', batchSize: this.batchSize };
  }

  dumpBatch(items: T[]): Buffer {
    try {
      return v8.serialize(items);
    } catch (e) {
      throw new SerializerError(
        `Cannot marshal batch: ${e instanceof Error ? e.message : String(e)}`,
        { cause: e },
      );
    }
  }

  loadBatch(payload: Buffer): T[] {
    let ret: unknown;
    try {
      ret = v8.deserialize(payload);
    } catch (e) {
      throw new SerializerError(
        `Cannot unmarshal batch: ${e instanceof Error ? e.message : String(e)}`,
        { cause: e },
      );
    }
    if (!Array.isArray(ret)) {
      throw new SerializerError('Marshalled batch is not an array');
    }
    return ret;
  }
}
