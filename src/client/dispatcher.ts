import { ContextError } from '../common/errors';
import { LocalProperties, RUN_JOB } from '../common/protocol';
import type { RDD } from './RDD';

/**
 * Resolve the partitions a job runs on. `null`/`undefined` means all of
 * them. Indices past the end are dropped: a caller may have computed them
 * before the partition count shrank.
 */
export function validatePartitions(
  partitions: unknown,
  partitionsSize: number,
): number[] {
  if (partitions == null) {
    return [...Array(partitionsSize).keys()];
  }
  if (!Array.isArray(partitions)) {
    throw new ContextError('Partitions must be null or an array');
  }
  const ret: number[] = [];
  for (const part of partitions) {
    if (typeof part !== 'number' || !Number.isInteger(part) || part < 0) {
      throw new ContextError(
        `Partition index must be a non-negative integer, got ${String(part)}`,
      );
    }
    if (part < partitionsSize) {
      ret.push(part);
    }
  }
  return ret;
}

// Run a job over `rdd` as it stands and decode every partition. Returns
// only once all requested partitions have been decoded.
export async function submitJob<T>(
  rdd: RDD<T>,
  partitions: number[],
  allowLocal: boolean,
  properties: LocalProperties,
): Promise<T[][]> {
  const iterator = await rdd.context.client.request({
    type: RUN_JOB,
    payload: {
      dataset: rdd.id,
      partitions,
      allowLocal,
      properties,
    },
  });
  return rdd.collectFromIterator(iterator, partitions);
}
