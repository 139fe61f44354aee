import { describe, it, expect } from 'vitest';
import {
  JsonSerializer,
  MarshalSerializer,
  PairSerializer,
  Serializer,
  SerializerError,
  UTF8Serializer,
  createSerializer,
  fromDescriptor,
  readFrames,
  writeFrame,
} from '../../index';

describe('round trip', () => {
  it('marshals mixed values in batches', () => {
    const serializer = new MarshalSerializer(2);
    const items = [1, 'two', { three: 3 }, [4], null];
    const data = serializer.dump(items);

    expect(readFrames(data)).toHaveLength(3);
    expect(serializer.load(data)).toEqual(items);
  });

  it('encodes json batches', () => {
    const serializer = new JsonSerializer(10);
    const items = [{ a: 1 }, 'x', 2];
    const data = serializer.dump(items);

    expect(readFrames(data)).toHaveLength(1);
    expect(serializer.load(data)).toEqual(items);
  });

  it('keeps utf8 text byte for byte', () => {
    const serializer = new UTF8Serializer(2);
    const items = ['', 'héllo', 'line\nbreak', '日本'];

    expect(serializer.load(serializer.dump(items))).toEqual(items);
  });

  it('zips pairs from two nested serializers', () => {
    const serializer = new PairSerializer(
      2,
      new UTF8Serializer(2),
      new MarshalSerializer(2),
    );
    const items: [string, number][] = [
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ];

    expect(serializer.load(serializer.dump(items))).toEqual(items);
  });

  it('writes nothing for an empty sequence', () => {
    const serializer = new MarshalSerializer(4);

    expect(serializer.dump([])).toHaveLength(0);
    expect(serializer.load(Buffer.alloc(0))).toEqual([]);
  });
});

describe('failures', () => {
  it('rejects non-strings in utf8', () => {
    const serializer: Serializer = new UTF8Serializer(1);

    expect(() => serializer.dump(['a', 1])).toThrow(
      'utf8 serializer can only encode strings, got number',
    );
  });

  it('rejects values v8 cannot clone', () => {
    expect(() => new MarshalSerializer(1).dump([() => 1])).toThrow(
      SerializerError,
    );
  });

  it('reports undecodable marshal bytes as a serializer error', () => {
    const corrupt = writeFrame(Buffer.from([0xff, 0x0f, 0x99]));

    expect(() => new MarshalSerializer(1).load(corrupt)).toThrow(SerializerError);
  });

  it('detects a truncated frame', () => {
    const serializer = new MarshalSerializer(10);
    const data = serializer.dump([1, 2]);

    expect(() => serializer.load(data.subarray(0, data.length - 1))).toThrow(
      SerializerError,
    );
  });

  it('rejects a batch size below 1', () => {
    expect(() => new JsonSerializer(0)).toThrow(
      'Batch size must be a positive integer, got 0',
    );
  });
});

describe('identity', () => {
  it('compares kind, batch size and nested serializers', () => {
    expect(new MarshalSerializer(5).sameAs(new MarshalSerializer(5))).toBe(true);
    expect(new MarshalSerializer(5).sameAs(new MarshalSerializer(6))).toBe(false);
    expect(new MarshalSerializer(5).sameAs(new JsonSerializer(5))).toBe(false);

    const pair = (valueBatch: number) =>
      new PairSerializer(1, new UTF8Serializer(1), new UTF8Serializer(valueBatch));
    expect(pair(1).sameAs(pair(1))).toBe(true);
    expect(pair(1).sameAs(pair(2))).toBe(false);
  });

  it('describes itself', () => {
    const serializer = new PairSerializer(
      4,
      new UTF8Serializer(4),
      new MarshalSerializer(8),
    );

    expect(serializer.toString()).toBe('pair(utf8[4], marshal[8])[4]');
  });
});

describe('registry', () => {
  it('fails fast on unknown names', () => {
    expect(() => createSerializer('yaml', { batchSize: 1 })).toThrow(
      SerializerError,
    );
  });

  it('defaults pair members to utf8', () => {
    expect(createSerializer('pair', { batchSize: 3 }).descriptor()).toEqual({
      name: 'pair',
      batchSize: 3,
      key: { name: 'utf8', batchSize: 3 },
      value: { name: 'utf8', batchSize: 3 },
    });
  });

  it('refuses key/value serializers for flat kinds', () => {
    expect(() =>
      createSerializer('marshal', {
        batchSize: 1,
        key: new UTF8Serializer(1),
      }),
    ).toThrow('Serializer marshal takes no key/value serializers');
  });

  it('rebuilds an identical serializer from its descriptor', () => {
    const serializer = new PairSerializer(
      7,
      new JsonSerializer(2),
      new MarshalSerializer(3),
    );
    const rebuilt = fromDescriptor(serializer.descriptor());

    expect(rebuilt).toBeInstanceOf(PairSerializer);
    expect(rebuilt.sameAs(serializer)).toBe(true);
  });
});
