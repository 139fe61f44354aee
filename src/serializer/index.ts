export * from './Serializer';
export * from './MarshalSerializer';
export * from './JsonSerializer';
export * from './UTF8Serializer';
export * from './PairSerializer';
export * from './registry';
