import {
  DeserializeOptions,
  deserialize,
} from '../common/SerializeFunction';
import { StagePayload } from '../common/protocol';

async function applyStage(
  stage: StagePayload,
  data: unknown[],
  partitionIndex: number,
  opts: DeserializeOptions,
): Promise<unknown[]> {
  switch (stage.kind) {
    case 'map': {
      const func = deserialize<(v: unknown) => unknown>(stage.func, opts);
      return data.map(v => func(v));
    }
    case 'flatMap': {
      const func = deserialize<(v: unknown) => Iterable<unknown>>(
        stage.func,
        opts,
      );
      const ret: unknown[] = [];
      for (const v of data) {
        for (const item of func(v)) {
          ret.push(item);
        }
      }
      return ret;
    }
    case 'filter': {
      const func = deserialize<(v: unknown) => unknown>(stage.func, opts);
      return data.filter(v => !!func(v));
    }
    case 'mapPartitions': {
      const func = deserialize<
        (v: unknown[]) => Iterable<unknown> | Promise<Iterable<unknown>>
      >(stage.func, opts);
      return Array.from(await func(data));
    }
    case 'mapPartitionsWithIndex': {
      const func = deserialize<
        (
          v: unknown[],
          partitionIndex: number,
        ) => Iterable<unknown> | Promise<Iterable<unknown>>
      >(stage.func, opts);
      return Array.from(await func(data, partitionIndex));
    }
  }
}

// Run every stage over one partition, in chain order.
export default async function executeCommand(
  stages: StagePayload[],
  input: unknown[],
  partitionIndex: number,
  opts: DeserializeOptions = {},
): Promise<unknown[]> {
  let data = input;
  for (const stage of stages) {
    data = await applyStage(stage, data, partitionIndex, opts);
  }
  return data;
}
