export { Context, createContext, CALL_SITE_PROPERTY } from './client/Context';
export type {
  JobOptions,
  ParallelizeOptions,
  SerializerOptions,
} from './client/Context';
export { RDD } from './client/RDD';
export { Command } from './client/Command';
export { Broadcast } from './client/Broadcast';
export { LocalClient } from './client/LocalClient';
export type { Client } from './client/Client';
export { validateConfig } from './client/config';
export type { ContextConfig, ResolvedConfig } from './client/config';
export { validatePartitions } from './client/dispatcher';
export type { StagingStrategy, StagingType } from './client/stagers';
export * from './common/errors';
export {
  serialize,
  requireModule,
  shippedFile,
} from './common/SerializeFunction';
export type {
  FunctionEnv,
  RequiredModule,
  SerializedFunction,
  ShippedFileMarker,
} from './common/SerializeFunction';
export type {
  DatasetRef,
  LocalProperties,
  PartitionResult,
  Request,
} from './common/protocol';
export * from './serializer';
