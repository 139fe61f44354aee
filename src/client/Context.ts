import * as path from 'path';
import * as v8 from 'v8';
import * as fs from 'fs-extra';
import { DebugFunc, createLogger } from '../common/debug';
import { ContextError, SerializerError } from '../common/errors';
import { FunctionEnv } from '../common/SerializeFunction';
import {
  ADD_FILE,
  BROADCAST,
  LocalProperties,
  TEXT_FILE,
  WHOLE_TEXT_FILES,
} from '../common/protocol';
import { Serializer } from '../serializer/Serializer';
import { createSerializer } from '../serializer/registry';
import { Broadcast } from './Broadcast';
import { Client } from './Client';
import { Command } from './Command';
import { ContextConfig, ResolvedConfig, validateConfig } from './config';
import { submitJob, validatePartitions } from './dispatcher';
import { LocalClient } from './LocalClient';
import { RDD } from './RDD';
import {
  DirectStager,
  FileStager,
  StagingStrategy,
  StagingType,
} from './stagers';

export const CALL_SITE_PROPERTY = 'externalCallSite';

export interface SerializerOptions {
  serializer?: string;
  batchSize?: number;
}

export interface ParallelizeOptions extends SerializerOptions {
  staging?: StagingType;
}

export interface JobOptions {
  // Upvalues of the job function.
  env?: FunctionEnv;
  // Merged over the context's local properties for this job only.
  properties?: LocalProperties;
}

function checkNumSlices(numSlices: number) {
  if (!Number.isInteger(numSlices) || numSlices < 1) {
    throw new ContextError(
      `Number of partitions must be a positive integer, got ${numSlices}`,
    );
  }
}

/**
 * Entry point of the driver. A context owns the connection to the engine,
 * a frozen configuration and a scratch directory for staged files; it
 * creates RDDs from local data or files and runs jobs on them.
 *
 *   const context = await createContext({ batchSize: 1 });
 *   const rdd = await context.parallelize([1, 2, 3, 4], 2);
 *   await context.runJob(rdd, (x: number) => x * 2, [0]); // [[2, 4]]
 *   await context.stop();
 */
export class Context {
  readonly config: ResolvedConfig;
  readonly client: Client;
  readonly tempDir: string;

  properties = new Map<string, string>();
  stagers: { [K in StagingType]: StagingStrategy };
  broadcastIdCounter = 0;
  stopped = false;
  debug: DebugFunc;

  private constructor(config: ResolvedConfig, client: Client, tempDir: string) {
    this.config = config;
    this.client = client;
    this.tempDir = tempDir;
    this.debug = createLogger('context');
    this.stagers = {
      file: new FileStager(client, tempDir, this.debug),
      direct: new DirectStager(client),
    };
  }

  static async create(config?: ContextConfig, client?: Client): Promise<Context> {
    const resolved = validateConfig(config);
    const engine = client || new LocalClient(resolved.engine);
    await engine.init();

    let tempDir: string;
    try {
      tempDir = await fs.mkdtemp(
        path.join(engine.localDir(), `${resolved.appName}-`),
      );
    } catch (e) {
      await engine.dispose();
      throw e;
    }
    const context = new Context(resolved, engine, tempDir);
    context.setCallSite(resolved.callSite);
    context.debug('Context ready, temp dir %s', tempDir);
    return context;
  }

  ensureActive() {
    if (this.stopped) {
      throw new ContextError('Context has been stopped');
    }
  }

  async stop(): Promise<void> {
    this.ensureActive();
    this.stopped = true;
    try {
      await this.client.dispose();
    } finally {
      await fs.remove(this.tempDir);
    }
    this.debug('Context stopped');
  }

  // Default level of parallelism to use when not given by user.
  defaultParallelism(): number {
    return this.client.defaultParallelism();
  }

  getSerializer(
    name?: string | null,
    {
      batchSize = this.config.batchSize,
      key,
      value,
    }: { batchSize?: number; key?: Serializer; value?: Serializer } = {},
  ): Serializer {
    return createSerializer(name || this.config.serializer, {
      batchSize,
      key,
      value,
    });
  }

  // Set a local property that tags every job submitted afterwards through
  // this context. A null value removes it.
  setLocalProperty(key: string, value: string | null) {
    if (value == null) {
      this.properties.delete(key);
    } else {
      this.properties.set(key, value);
    }
  }

  getLocalProperty(key: string): string | null {
    const value = this.properties.get(key);
    return value === undefined ? null : value;
  }

  setCallSite(site: string) {
    this.setLocalProperty(CALL_SITE_PROPERTY, site);
  }

  getCallSite(): string | null {
    return this.getLocalProperty(CALL_SITE_PROPERTY);
  }

  jobProperties(overrides: LocalProperties = {}): LocalProperties {
    const ret: LocalProperties = {};
    for (const [key, value] of this.properties) {
      ret[key] = value;
    }
    return { ...ret, ...overrides };
  }

  // Ship files to the engine, which makes them available to every job.
  async addFile(...files: string[]): Promise<void> {
    this.ensureActive();
    for (const file of files) {
      await this.client.request({
        type: ADD_FILE,
        payload: path.resolve(file),
      });
    }
  }

  async broadcast<T>(value: T, id?: number): Promise<Broadcast<T>> {
    this.ensureActive();
    const broadcastId = id == null ? ++this.broadcastIdCounter : id;
    let data: Buffer;
    try {
      data = v8.serialize(value);
    } catch (e) {
      throw new SerializerError('Cannot serialize broadcast value', {
        cause: e,
      });
    }
    await this.client.request({
      type: BROADCAST,
      payload: { id: broadcastId, data },
    });
    return new Broadcast(this, broadcastId, value);
  }

  /**
   * Distribute a local collection to form an RDD. Ranges, sets and
   * generators are materialized first, in iteration order.
   *
   * With `parallelizeStrategy: 'deep_copy'` the elements are cloned before
   * staging starts, so mutating them while the call is pending has no
   * effect on what the engine receives.
   */
  async parallelize<T>(
    data: Iterable<T>,
    numSlices: number = this.defaultParallelism(),
    options: ParallelizeOptions = {},
  ): Promise<RDD<T>> {
    this.ensureActive();
    checkNumSlices(numSlices);

    const items: T[] =
      this.config.parallelizeStrategy === 'deep_copy'
        ? v8.deserialize(v8.serialize(Array.from(data)))
        : Array.from(data);
    const serializer = this.getSerializer(options.serializer, {
      batchSize: options.batchSize,
    });
    const stager = this.stagers[options.staging || this.config.staging];

    const ref = await stager.stage(items, numSlices, serializer);
    this.debug(
      'Parallelized %d items into dataset %d via %s staging',
      items.length,
      ref.id,
      stager.type,
    );
    return new RDD<T>(this, ref, serializer);
  }

  // Numbers from `from` (inclusive) to `to` (exclusive). With one argument,
  // numbers from 0 to `from`.
  async range(
    from: number,
    to?: number,
    step: number = 1,
    numSlices?: number,
    options?: ParallelizeOptions,
  ): Promise<RDD<number>> {
    if (to == null) {
      to = from;
      from = 0;
    }
    if (step === 0) {
      throw new ContextError('Range step must not be 0');
    }
    const finalCount = Math.max(0, Math.ceil((to - from) / step));
    const items: number[] = [];
    for (let i = 0; i < finalCount; i++) {
      items.push(from + step * i);
    }
    return this.parallelize(items, numSlices, options);
  }

  /**
   * Read a text file, or every file of a directory, as an RDD of lines.
   * The engine reads the files itself; nothing is staged.
   */
  async textFile(
    baseUrl: string,
    minPartitions: number = this.defaultParallelism(),
    options: SerializerOptions = {},
  ): Promise<RDD<string>> {
    this.ensureActive();
    checkNumSlices(minPartitions);
    const serializer = this.getSerializer(options.serializer, {
      batchSize: options.batchSize,
    });
    const deserializer = this.getSerializer('utf8');

    const ref = await this.client.request({
      type: TEXT_FILE,
      payload: {
        path: baseUrl,
        numPartitions: minPartitions,
        serializer: deserializer.descriptor(),
      },
    });
    return new RDD<string>(this, ref, serializer, deserializer);
  }

  /**
   * Read every file of a directory as one `[path, content]` record, where
   * `path` is the absolute path of the file.
   */
  async wholeTextFiles(
    baseUrl: string,
    minPartitions: number = this.defaultParallelism(),
    options: SerializerOptions = {},
  ): Promise<RDD<[string, string]>> {
    this.ensureActive();
    checkNumSlices(minPartitions);
    const serializer = this.getSerializer(options.serializer, {
      batchSize: options.batchSize,
    });
    const deserializer = this.getSerializer('pair', {
      key: this.getSerializer('utf8'),
      value: this.getSerializer('utf8'),
    });

    const ref = await this.client.request({
      type: WHOLE_TEXT_FILES,
      payload: {
        path: baseUrl,
        numPartitions: minPartitions,
        serializer: deserializer.descriptor(),
      },
    });
    return new RDD<[string, string]>(this, ref, serializer, deserializer);
  }

  /**
   * Apply `func` to every element of the given partitions (all of them when
   * `partitions` is null) and return one array per partition, in the order
   * the partitions were requested.
   *
   *   const rdd = await context.parallelize([0, 1, 2, 3, 4, 5], 2, { batchSize: 1 });
   *   await context.runJob(rdd, (x: number) => String(x), [0, 1]);
   *   // [['0', '1', '2'], ['3', '4', '5']]
   */
  runJob<T, R>(
    rdd: RDD<T>,
    func: (v: T) => R,
    partitions: readonly number[] | null = null,
    allowLocal: boolean = false,
    options: JobOptions = {},
  ): Promise<R[][]> {
    return this.runJobWithCommand(
      rdd,
      partitions,
      allowLocal,
      Command.map(func, options.env),
      options,
    );
  }

  // Execute the given command on a specific set of partitions.
  async runJobWithCommand<T, R>(
    rdd: RDD<T>,
    partitions: unknown,
    allowLocal: boolean,
    command: Command<T, R>,
    options: JobOptions = {},
  ): Promise<R[][]> {
    this.ensureActive();
    const parts = validatePartitions(partitions, rdd.partitionsSize);

    const mapped = await rdd.newRDDFromCommand(command);
    return submitJob(
      mapped,
      parts,
      allowLocal,
      this.jobProperties(options.properties),
    );
  }
}

export function createContext(
  config?: ContextConfig,
  client?: Client,
): Promise<Context> {
  return Context.create(config, client);
}
