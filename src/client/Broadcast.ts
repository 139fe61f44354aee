import { BroadcastMarker } from '../common/SerializeFunction';
import { RELEASE_BROADCAST } from '../common/protocol';
import type { Context } from './Context';

/**
 * A read-only value shipped to the engine once. Pass it in a function
 * environment to read it inside a stage:
 *
 *   const factor = await context.broadcast(10);
 *   context.runJob(rdd, (x: number) => x * factor.valueOf(), null, false, {
 *     env: { factor },
 *   });
 *
 * Inside the stage, `factor` is the broadcast value itself.
 */
export class Broadcast<T> implements BroadcastMarker {
  readonly __isBroadcast = true;
  readonly id: number;
  readonly value: T;
  context: Context;
  released = false;

  constructor(context: Context, id: number, value: T) {
    this.context = context;
    this.id = id;
    this.value = value;
  }

  valueOf(): T {
    return this.value;
  }

  async unpersist(): Promise<void> {
    if (!this.released) {
      this.released = true;
      await this.context.client.request({
        type: RELEASE_BROADCAST,
        payload: this.id,
      });
    }
  }
}
