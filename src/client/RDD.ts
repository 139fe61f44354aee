import concatArrays from '../common/concatArrays';
import { EngineError } from '../common/errors';
import { DatasetRef, PIPELINE, PartitionResult } from '../common/protocol';
import { Serializer } from '../serializer/Serializer';
import { Command } from './Command';
import type { Context } from './Context';
import { submitJob } from './dispatcher';

function decode<T>(serializer: Serializer, data: Buffer): T[] {
  // Bytes carry no types; they hold whatever the producing pipeline emitted.
  return serializer.load(data) as T[];
}

/**
 * Driver-side handle on a dataset the engine holds.
 *
 * `deserializer` reads the source dataset; `serializer` writes what a
 * command pipeline emits. For staged datasets the two are the same object.
 */
export class RDD<T> {
  readonly context: Context;
  readonly ref: DatasetRef;
  readonly serializer: Serializer;
  readonly deserializer: Serializer;

  // Set on pipelined RDDs: the dataset the chain reads, and the chain.
  readonly source: RDD<unknown> | null;
  readonly command: Command<unknown, T> | null;

  constructor(
    context: Context,
    ref: DatasetRef,
    serializer: Serializer,
    deserializer: Serializer = serializer,
    pipeline?: { source: RDD<unknown>; command: Command<unknown, T> },
  ) {
    this.context = context;
    this.ref = ref;
    this.serializer = serializer;
    this.deserializer = deserializer;
    this.source = pipeline ? pipeline.source : null;
    this.command = pipeline ? pipeline.command : null;
  }

  get id(): number {
    return this.ref.id;
  }

  get partitionsSize(): number {
    return this.ref.numPartitions;
  }

  // Serializer that decodes the partitions of this dataset.
  get outputSerializer(): Serializer {
    return this.command ? this.serializer : this.deserializer;
  }

  /**
   * Describe this dataset with `command` applied. Nothing runs yet. A
   * pipelined RDD extends its own chain, so the engine always sees a single
   * command over a source dataset.
   */
  async newRDDFromCommand<R>(command: Command<T, R>): Promise<RDD<R>> {
    let base: RDD<unknown> = this;
    let chain: Command<unknown, R> = command;
    if (this.source && this.command) {
      base = this.source;
      chain = this.command.then(command);
    }

    const ref = await this.context.client.request({
      type: PIPELINE,
      payload: {
        parent: base.id,
        command: chain.toPayload(base.deserializer, base.serializer),
      },
    });
    return new RDD<R>(this.context, ref, base.serializer, base.deserializer, {
      source: base,
      command: chain,
    });
  }

  // Drain the engine's per-partition results and order them like `partitions`.
  async collectFromIterator(
    iterator: AsyncIterable<PartitionResult>,
    partitions: number[],
  ): Promise<T[][]> {
    const serializer = this.outputSerializer;
    const results = new Map<number, T[]>();
    for await (const { partition, data } of iterator) {
      results.set(partition, decode<T>(serializer, data));
    }
    return partitions.map(part => {
      const result = results.get(part);
      if (!result) {
        throw new EngineError(`Engine returned no result for partition ${part}`);
      }
      return result;
    });
  }

  async collect(): Promise<T[]> {
    this.context.ensureActive();
    const partitions = [...Array(this.partitionsSize).keys()];
    return concatArrays(
      await submitJob(this, partitions, false, this.context.jobProperties()),
    );
  }
}
