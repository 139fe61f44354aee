import { DebugFunc, createLogger } from '../common/debug';
import { PartitionResult } from '../common/protocol';
import { fromDescriptor } from '../serializer/registry';
import type { MasterServer } from '../master/MasterServer';
import WorkerContext from './WorkerContext';
import executeCommand from './executeCommand';

// Iterator an array with a async function, and break promise chain to keep memory safe.
function safeRepeat<T>(
  arr: T[],
  func: (arg: T, index: number) => void | Promise<void>,
): Promise<void> {
  return new Promise((resolve, reject) => {
    let index = -1;

    function next() {
      index++;
      if (index >= arr.length) {
        resolve();
        return;
      }
      Promise.resolve(func(arr[index], index)).then(next, reject);
    }
    next();
  });
}

/**
 * Runs partitions for the local engine, one at a time. Source partitions
 * come from the master; pipelined ones are decoded, run through their
 * command and encoded again here.
 */
export class LocalWorker {
  id: string;
  master: MasterServer;
  context: WorkerContext;
  debug: DebugFunc;

  constructor(master: MasterServer, id: string) {
    this.id = id;
    this.master = master;
    this.context = new WorkerContext(msg => master.send(msg));
    this.debug = createLogger(`worker:${id}`);
  }

  async compute(datasetId: number, index: number): Promise<Buffer> {
    const dataset = this.master.getDataset(datasetId);
    if (dataset.type !== 'pipelined') {
      return this.master.loadPartition(dataset, index);
    }

    const { command } = dataset;
    const input = fromDescriptor(command.deserializer).load(
      await this.compute(dataset.parent, index),
    );

    const broadcasts = new Map<number, unknown>();
    const output = await executeCommand(command.stages, input, index, {
      resolveBroadcast: id => {
        if (!broadcasts.has(id)) {
          broadcasts.set(id, this.master.getBroadcast(id));
        }
        return broadcasts.get(id);
      },
      resolveFile: name => this.master.getFile(name),
    });
    return fromDescriptor(command.serializer).dump(output);
  }

  async calc(
    datasetId: number,
    partitions: number[],
    job: number,
  ): Promise<PartitionResult[]> {
    const results: PartitionResult[] = [];
    await safeRepeat(partitions, async partition => {
      results.push({
        partition,
        data: await this.compute(datasetId, partition),
      });
      this.context.tick(job);
    });
    if (partitions.length > 0) {
      this.debug('Computed partitions %j of dataset %d', partitions, datasetId);
    }
    return results;
  }
}
