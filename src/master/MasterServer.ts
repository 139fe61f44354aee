import * as path from 'path';
import * as v8 from 'v8';
import * as fs from 'fs-extra';
import { Response } from '../client/Client';
import debug, { createLogger, setDebugFunc } from '../common/debug';
import { SerializerError } from '../common/errors';
import { processRequest } from '../common/handler';
import {
  CommandPayload,
  DatasetRef,
  LocalProperties,
  PartitionResult,
  PayloadOf,
  RUN_JOB,
  Request,
  RequestType,
  ResultOf,
} from '../common/protocol';
import splitEven from '../common/splitEven';
import {
  SerializerDescriptor,
  describe,
  readFrames,
  sameDescriptor,
  writeFrame,
} from '../serializer/Serializer';
import { fromDescriptor } from '../serializer/registry';
import { LocalWorker } from '../worker/LocalWorker';
import './handlers';

export interface FileLoader {
  canHandleUrl(baseUrl: string): boolean | Promise<boolean>;
  listFiles(baseUrl: string): string[] | Promise<string[]>;
  resolveFile(baseUrl: string, filename: string): string;
  loadFile(baseUrl: string, filename: string): Buffer | Promise<Buffer>;
}

// Partition data is always a stream of frames as the serializers write it.
export type Dataset =
  | {
      type: 'batches';
      serializer: SerializerDescriptor;
      partitions: Buffer[];
    }
  | {
      type: 'lines';
      serializer: SerializerDescriptor;
      baseUrl: string;
      files: string[];
      numPartitions: number;
    }
  | {
      type: 'wholeFiles';
      serializer: SerializerDescriptor;
      baseUrl: string;
      partitions: string[][];
    }
  | {
      type: 'pipelined';
      parent: number;
      command: CommandPayload;
      numPartitions: number;
    };

export interface JobRecord {
  id: number;
  dataset: number;
  partitions: number[];
  allowLocal: boolean;
  properties: LocalProperties;
}

async function* iterate<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

function checkPartitionCount(numPartitions: number) {
  if (!Number.isInteger(numPartitions) || numPartitions < 1) {
    throw new Error(
      `Partition count must be a positive integer, got ${numPartitions}`,
    );
  }
}

/**
 * In-process engine: holds datasets, broadcasts and shipped files, and runs
 * jobs by handing partitions to its workers.
 */
export abstract class MasterServer {
  workers: LocalWorker[] = [];
  datasets = new Map<number, Dataset>();
  datasetIdCounter = 0;
  broadcasts = new Map<number, Buffer>();
  files: string[] = [];
  jobs: JobRecord[] = [];

  fileLoaderRegistry: FileLoader[] = [];

  constructor() {
    setDebugFunc(createLogger('engine'));
  }

  abstract send(m: Response): void;
  abstract localDir(): string;

  registerFileLoader(loader: FileLoader) {
    this.fileLoaderRegistry.push(loader);
  }

  async init(): Promise<void> {}
  async dispose(): Promise<void> {
    this.datasets.clear();
    this.broadcasts.clear();
  }

  onTaskBegin(job: number, progressTotal: number) {
    this.send({
      type: 'task',
      job,
      partitions: progressTotal,
      taskIndex: 1,
      tasks: 1,
    });
  }

  processRequest<K extends RequestType>(m: Request<K>): Promise<ResultOf<K>> {
    return processRequest(m, this);
  }

  async getFileLoader(baseUrl: string): Promise<FileLoader> {
    for (const loader of this.fileLoaderRegistry) {
      if (await loader.canHandleUrl(baseUrl)) {
        return loader;
      }
    }
    throw new Error(`No valid loader for url ${baseUrl}`);
  }

  addDataset(dataset: Dataset): DatasetRef {
    const id = ++this.datasetIdCounter;
    this.datasets.set(id, dataset);
    return { id, numPartitions: this.getPartitionCount(dataset) };
  }

  getDataset(id: number): Dataset {
    const dataset = this.datasets.get(id);
    if (!dataset) {
      throw new Error(`Unknown dataset ${id}`);
    }
    return dataset;
  }

  getPartitionCount(dataset: Dataset): number {
    switch (dataset.type) {
      case 'batches':
      case 'wholeFiles':
        return dataset.partitions.length;
      case 'lines':
      case 'pipelined':
        return dataset.numPartitions;
    }
  }

  // Descriptor of the serializer that wrote this dataset's partitions.
  getOutputDescriptor(dataset: Dataset): SerializerDescriptor {
    return dataset.type === 'pipelined'
      ? dataset.command.serializer
      : dataset.serializer;
  }

  ingest(
    data: Buffer,
    numPartitions: number,
    serializer: SerializerDescriptor,
  ): DatasetRef {
    checkPartitionCount(numPartitions);
    const frames = readFrames(data);
    const ref = this.addDataset({
      type: 'batches',
      serializer,
      partitions: splitEven(frames, numPartitions).map(v =>
        Buffer.concat(v.map(frame => writeFrame(frame))),
      ),
    });
    debug(
      'Dataset %d: %d frames over %d partitions, %s',
      ref.id,
      frames.length,
      numPartitions,
      describe(serializer),
    );
    return ref;
  }

  async readFile(
    file: string,
    numPartitions: number,
    serializer: SerializerDescriptor,
  ): Promise<DatasetRef> {
    return this.ingest(await fs.readFile(file), numPartitions, serializer);
  }

  async textFile(
    baseUrl: string,
    numPartitions: number,
    serializer: SerializerDescriptor,
  ): Promise<DatasetRef> {
    checkPartitionCount(numPartitions);
    const loader = await this.getFileLoader(baseUrl);
    const files = await loader.listFiles(baseUrl);
    return this.addDataset({
      type: 'lines',
      serializer,
      baseUrl,
      files,
      numPartitions,
    });
  }

  async wholeTextFiles(
    baseUrl: string,
    numPartitions: number,
    serializer: SerializerDescriptor,
  ): Promise<DatasetRef> {
    checkPartitionCount(numPartitions);
    const loader = await this.getFileLoader(baseUrl);
    const files = await loader.listFiles(baseUrl);
    return this.addDataset({
      type: 'wholeFiles',
      serializer,
      baseUrl,
      partitions: splitEven(files, numPartitions),
    });
  }

  pipeline(parent: number, command: CommandPayload): DatasetRef {
    const source = this.getDataset(parent);
    const written = this.getOutputDescriptor(source);
    if (!sameDescriptor(written, command.deserializer)) {
      throw new SerializerError(
        `Dataset ${parent} is written with ${describe(written)} but the command reads it with ${describe(command.deserializer)}`,
      );
    }
    return this.addDataset({
      type: 'pipelined',
      parent,
      command,
      numPartitions: this.getPartitionCount(source),
    });
  }

  // Framed contents of a partition of a source (non-pipelined) dataset.
  async loadPartition(dataset: Dataset, index: number): Promise<Buffer> {
    switch (dataset.type) {
      case 'batches':
        return dataset.partitions[index];
      case 'lines': {
        const lines = await this.readLines(dataset.baseUrl, dataset.files);
        return fromDescriptor(dataset.serializer).dump(
          splitEven(lines, dataset.numPartitions)[index],
        );
      }
      case 'wholeFiles': {
        const loader = await this.getFileLoader(dataset.baseUrl);
        const records: [string, string][] = [];
        for (const file of dataset.partitions[index]) {
          const content = await loader.loadFile(dataset.baseUrl, file);
          records.push([
            loader.resolveFile(dataset.baseUrl, file),
            content.toString('utf8'),
          ]);
        }
        return fromDescriptor(dataset.serializer).dump(records);
      }
      case 'pipelined':
        throw new Error('Pipelined datasets are computed by workers');
    }
  }

  async readLines(baseUrl: string, files: string[]): Promise<string[]> {
    const loader = await this.getFileLoader(baseUrl);
    const ret: string[] = [];
    for (const file of files) {
      const content = await loader.loadFile(baseUrl, file);
      const lines = content
        .toString('utf8')
        .replace(/\r/g, '')
        .split('\n');
      // Remove last empty line.
      if (!lines[lines.length - 1]) {
        lines.pop();
      }
      ret.push(...lines);
    }
    return ret;
  }

  splitByWorker<T>(args: T[]): T[][] {
    const ret: T[][] = this.workers.map(() => []);
    const count = this.workers.length;
    for (const [i, item] of args.entries()) {
      ret[i % count].push(item);
    }
    return ret;
  }

  async runJob({
    dataset,
    partitions,
    allowLocal,
    properties,
  }: PayloadOf<typeof RUN_JOB>): Promise<AsyncIterable<PartitionResult>> {
    const count = this.getPartitionCount(this.getDataset(dataset));
    for (const part of partitions) {
      if (!Number.isInteger(part) || part < 0 || part >= count) {
        throw new Error(
          `Partition ${part} is out of range for dataset ${dataset} (${count} partitions)`,
        );
      }
    }

    const job: JobRecord = {
      id: this.jobs.length + 1,
      dataset,
      partitions: [...partitions],
      allowLocal,
      properties: { ...properties },
    };
    this.jobs.push(job);
    debug(
      'Job %d on dataset %d, partitions %j, call site %s',
      job.id,
      dataset,
      partitions,
      properties.externalCallSite,
    );

    // A single-partition job marked local skips the split.
    const groups =
      allowLocal && partitions.length <= 1
        ? [partitions]
        : this.splitByWorker(partitions);

    this.onTaskBegin(job.id, partitions.length);
    let resps: PartitionResult[][];
    try {
      resps = await Promise.all(
        groups.map((group, i) => this.workers[i].calc(dataset, group, job.id)),
      );
    } finally {
      this.send({ type: 'jobEnd', job: job.id });
    }

    // Results come back grouped by worker, not in request order.
    const results: PartitionResult[] = [];
    for (const resp of resps) {
      results.push(...resp);
    }
    return iterate(results);
  }

  addBroadcast(id: number, data: Buffer) {
    if (this.broadcasts.has(id)) {
      throw new Error(`Broadcast ${id} already exists`);
    }
    this.broadcasts.set(id, data);
  }

  getBroadcast(id: number): unknown {
    const data = this.broadcasts.get(id);
    if (!data) {
      throw new Error(`Unknown broadcast ${id}`);
    }
    return v8.deserialize(data);
  }

  releaseBroadcast(id: number) {
    this.broadcasts.delete(id);
  }

  // Copy a file into the scratch dir, where jobs find it by name.
  async addFile(file: string): Promise<void> {
    const target = path.join(this.localDir(), 'files', path.basename(file));
    await fs.copy(file, target);
    this.files.push(target);
    debug('Added file %s', target);
  }

  getFile(name: string): string {
    const found = this.files.find(v => path.basename(v) === name);
    if (!found) {
      throw new Error(`File ${name} was not added`);
    }
    return found;
  }
}
