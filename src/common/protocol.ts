import type { SerializerDescriptor } from '../serializer/Serializer';
import type { SerializedFunctionStruct } from './SerializeFunction';

export const READ_FILE = '@@engine/readFile';
export const PARALLELIZE = '@@engine/parallelize';
export const TEXT_FILE = '@@engine/textFile';
export const WHOLE_TEXT_FILES = '@@engine/wholeTextFiles';
export const PIPELINE = '@@engine/pipeline';
export const RUN_JOB = '@@engine/runJob';
export const BROADCAST = '@@engine/broadcast';
export const RELEASE_BROADCAST = '@@engine/releaseBroadcast';
export const ADD_FILE = '@@engine/addFile';

export type StageKind =
  | 'map'
  | 'flatMap'
  | 'filter'
  | 'mapPartitions'
  | 'mapPartitionsWithIndex';

export interface StagePayload {
  kind: StageKind;
  func: SerializedFunctionStruct;
}

export interface CommandPayload {
  // Stages in application order.
  stages: StagePayload[];
  deserializer: SerializerDescriptor;
  serializer: SerializerDescriptor;
}

export interface DatasetRef {
  id: number;
  numPartitions: number;
}

export interface PartitionResult {
  partition: number;
  data: Buffer;
}

export type LocalProperties = { [key: string]: string };

export interface EngineProtocol {
  [READ_FILE]: {
    payload: {
      path: string;
      numPartitions: number;
      serializer: SerializerDescriptor;
    };
    result: DatasetRef;
  };
  [PARALLELIZE]: {
    payload: {
      batches: Buffer[];
      numPartitions: number;
      serializer: SerializerDescriptor;
    };
    result: DatasetRef;
  };
  [TEXT_FILE]: {
    payload: {
      path: string;
      numPartitions: number;
      serializer: SerializerDescriptor;
    };
    result: DatasetRef;
  };
  [WHOLE_TEXT_FILES]: {
    payload: {
      path: string;
      numPartitions: number;
      serializer: SerializerDescriptor;
    };
    result: DatasetRef;
  };
  [PIPELINE]: {
    payload: {
      parent: number;
      command: CommandPayload;
    };
    result: DatasetRef;
  };
  [RUN_JOB]: {
    payload: {
      dataset: number;
      partitions: number[];
      allowLocal: boolean;
      properties: LocalProperties;
    };
    result: AsyncIterable<PartitionResult>;
  };
  [BROADCAST]: {
    payload: {
      id: number;
      data: Buffer;
    };
    result: void;
  };
  [RELEASE_BROADCAST]: {
    payload: number;
    result: void;
  };
  [ADD_FILE]: {
    payload: string;
    result: void;
  };
}

export type RequestType = keyof EngineProtocol;
export type PayloadOf<K extends RequestType> = EngineProtocol[K]['payload'];
export type ResultOf<K extends RequestType> = EngineProtocol[K]['result'];

export interface Request<K extends RequestType = RequestType> {
  type: K;
  payload: PayloadOf<K>;
}
