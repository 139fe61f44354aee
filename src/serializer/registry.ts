import { Serializer, SerializerDescriptor, SerializerName } from './Serializer';
import { MarshalSerializer } from './MarshalSerializer';
import { JsonSerializer } from './JsonSerializer';
import { UTF8Serializer } from './UTF8Serializer';
import { PairSerializer } from './PairSerializer';
import { SerializerError } from '../common/errors';

export const SERIALIZER_NAMES = ['marshal', 'json', 'utf8', 'pair'] as const;

export interface SerializerArgs {
  batchSize: number;
  key?: Serializer;
  value?: Serializer;
}

type SerializerFactory = (args: SerializerArgs) => Serializer;

const registry: { [K in SerializerName]: SerializerFactory } = {
  marshal: ({ batchSize }) => new MarshalSerializer(batchSize),
  json: ({ batchSize }) => new JsonSerializer(batchSize),
  utf8: ({ batchSize }) => new UTF8Serializer(batchSize),
  pair: ({ batchSize, key, value }) =>
    new PairSerializer(
      batchSize,
      key || new UTF8Serializer(batchSize),
      value || new UTF8Serializer(batchSize),
    ),
};

export function isSerializerName(name: string): name is SerializerName {
  return SERIALIZER_NAMES.some(v => v === name);
}

export function createSerializer(name: string, args: SerializerArgs): Serializer {
  if (!isSerializerName(name)) {
    throw new SerializerError(
      `Unknown serializer ${name}, expected one of ${SERIALIZER_NAMES.join(', ')}`,
    );
  }
  if (name !== 'pair' && (args.key || args.value)) {
    throw new SerializerError(`Serializer ${name} takes no key/value serializers`);
  }
  return registry[name](args);
}

export function fromDescriptor(d: SerializerDescriptor): Serializer {
  if (d.name === 'pair') {
    return createSerializer(d.name, {
      batchSize: d.batchSize,
      key: fromDescriptor(d.key),
      value: fromDescriptor(d.value),
    });
  }
  return createSerializer(d.name, { batchSize: d.batchSize });
}
