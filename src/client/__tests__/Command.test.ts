import { describe, it, expect } from 'vitest';
import * as v8 from 'v8';
import { Command, JsonSerializer, MarshalSerializer, serialize } from '../../index';
import executeCommand from '../../worker/executeCommand';

describe('Command', () => {
  it('keeps stages in application order', () => {
    const command = Command.map((x: number) => x + 1)
      .then(Command.filter((x: number) => x % 2 === 0))
      .then(Command.flatMap((x: number) => [x, x]));

    expect(command.length).toBe(3);
    expect(command.stages().map(v => v.kind)).toEqual([
      'map',
      'filter',
      'flatMap',
    ]);
  });

  it('appends every stage of a longer chain', () => {
    const first = Command.map((x: number) => x);
    const rest = Command.filter((x: number) => x > 0).then(
      Command.map((x: number) => String(x)),
    );
    const command = first.then(rest);

    expect(command.stages().map(v => v.kind)).toEqual(['map', 'filter', 'map']);
    expect(first.length).toBe(1);
    expect(rest.length).toBe(2);
  });

  it('accepts a pre-serialized function', () => {
    const limit = 2;
    const func = serialize((x: number) => x > limit, { limit });

    expect(Command.filter(func).stage.func).toBe(func);
  });

  it('describes both serializers in its payload', () => {
    const payload = Command.map((x: number) => x).toPayload(
      new MarshalSerializer(2),
      new JsonSerializer(3),
    );

    expect(payload.deserializer).toEqual({ name: 'marshal', batchSize: 2 });
    expect(payload.serializer).toEqual({ name: 'json', batchSize: 3 });
  });

  it('runs after crossing a process boundary', async () => {
    const step = 1;
    const command = Command.map((x: number) => x + step, { step })
      .then(Command.filter((x: number) => x % 2 === 0))
      .then(Command.flatMap((x: number) => [x, x]));
    const payload = v8.deserialize(
      v8.serialize(
        command.toPayload(new MarshalSerializer(1), new MarshalSerializer(1)),
      ),
    );

    expect(await executeCommand(payload.stages, [1, 2, 3, 4], 0)).toEqual([
      2, 2, 4, 4,
    ]);
  });
});
