import { Serializer, SerializerDescriptor } from './Serializer';
import { SerializerError } from '../common/errors';

export class JsonSerializer<T = unknown> extends Serializer<T> {
  descriptor(): SerializerDescriptor {
    return { name: 'json', batchSize: this.batchSize };
  }

  dumpBatch(items: T[]): Buffer {
    return Buffer.from(JSON.stringify(items), 'utf8');
  }

  loadBatch(payload: Buffer): T[] {
    let ret: unknown;
    try {
      ret = JSON.parse(payload.toString('utf8'));
    } catch (e) {
      throw new SerializerError('Malformed JSON batch', { cause: e });
    }
    if (!Array.isArray(ret)) {
      throw new SerializerError('JSON batch is not an array');
    }
    return ret;
  }
}
