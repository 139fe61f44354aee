import { describe, it, expect } from 'vitest';
import * as v8 from 'v8';
import {
  deserialize,
  requireModule,
  serialize,
  shippedFile,
} from '../SerializeFunction';

describe('SerializeFunction', () => {
  it('captures plain upvalues', () => {
    const offset = 10;
    const f = serialize((x: number) => x + offset, { offset });

    expect(deserialize<(x: number) => number>(f)(1)).toBe(11);
  });

  it('survives a v8 round trip', () => {
    const factor = 3;
    const f = v8.deserialize(
      v8.serialize(serialize((x: number) => x * factor, { factor })),
    );

    expect(deserialize<(x: number) => number>(f)(2)).toBe(6);
  });

  it('inlines upvalue functions', () => {
    const double = (v: number) => v * 2;
    const f = serialize((x: number) => double(x) + 1, { double });

    expect(f.functions.map(v => v.name)).toEqual(['double']);
    expect(deserialize<(x: number) => number>(f)(3)).toBe(7);
  });

  it('restores nested serialized functions', () => {
    const inner = serialize((v: number) => v * 3);
    const f = serialize((x: number) => inner(x), { inner });

    expect(deserialize<(x: number) => number>(f)(2)).toBe(6);
  });

  it('loads required modules', () => {
    const nodePath = requireModule<typeof import('path')>('path');
    const f = serialize((p: string) => nodePath.basename(p), { nodePath });

    expect(deserialize<(p: string) => string>(f)('/a/b.txt')).toBe('b.txt');
  });

  it('sends only the id of a broadcast', () => {
    const factor = { __isBroadcast: true as const, id: 7, value: 5 };
    const f = serialize((x: number) => x * Number(factor), { factor });

    expect(f.values).toEqual([{ __isBroadcast: true, id: 7 }]);
    const g = deserialize<(x: number) => number>(f, {
      resolveBroadcast: id => (id === 7 ? 5 : 0),
    });
    expect(g(2)).toBe(10);
    expect(() => deserialize(f)).toThrow('Broadcast 7 is not available here.');
  });

  it('resolves shipped files to engine paths', () => {
    const data = shippedFile('data.csv');
    const f = serialize(() => data.valueOf(), { data });

    expect(data.valueOf()).toBe('data.csv');
    expect(f.values).toEqual([{ __isShippedFile: true, name: 'data.csv' }]);
    const g = deserialize<() => string>(f, {
      resolveFile: name => `/scratch/files/${name}`,
    });
    expect(g()).toBe('/scratch/files/data.csv');
    expect(() => deserialize(f)).toThrow('File data.csv is not available here.');
  });
});
