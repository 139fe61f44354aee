import { Request, RequestType, ResultOf } from '../common/protocol';

/**
 * Connection to an engine. `request` is the only way the driver talks to
 * it; everything else is metadata the driver needs before submitting.
 */
export interface Client {
  init(): Promise<void>;
  request<K extends RequestType>(m: Request<K>): Promise<ResultOf<K>>;
  dispose(): void | Promise<void>;

  defaultParallelism(): number;
  // Scratch directory the engine and driver share for staged files.
  localDir(): string;
}

// Engine-to-client notifications, tagged with the job they belong to.
export interface ProgressMessage {
  type: 'progress';
  job: number;
  tick: number;
}

export interface TaskMessage {
  type: 'task';
  job: number;
  partitions: number;
  taskIndex: number;
  tasks: number;
}

export interface JobEndMessage {
  type: 'jobEnd';
  job: number;
}

export type Response = ProgressMessage | TaskMessage | JobEndMessage;
