import { Serializer, SerializerDescriptor, readFrames, writeFrame } from './Serializer';
import { SerializerError } from '../common/errors';

export class UTF8Serializer extends Serializer<string> {
  descriptor(): SerializerDescriptor {
    return { name: 'utf8', batchSize: this.batchSize };
  }

  dumpBatch(items: string[]): Buffer {
    return Buffer.concat(
      items.map(item => {
        if (typeof item !== 'string') {
          throw new SerializerError(
            `utf8 serializer can only encode strings, got ${typeof item}`,
          );
        }
        return writeFrame(Buffer.from(item, 'utf8'));
      }),
    );
  }

  loadBatch(payload: Buffer): string[] {
    return readFrames(payload).map(v => v.toString('utf8'));
  }
}
