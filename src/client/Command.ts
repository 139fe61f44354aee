import {
  FunctionEnv,
  isSerializedFunction,
  serialize,
} from '../common/SerializeFunction';
import { CommandPayload, StageKind, StagePayload } from '../common/protocol';
import { Serializer } from '../serializer/Serializer';

type Awaitable<T> = T | Promise<T>;

function toStage<F extends (...args: never[]) => unknown>(
  kind: StageKind,
  func: F,
  env?: FunctionEnv,
): StagePayload {
  return {
    kind,
    func: isSerializedFunction(func) ? func : serialize(func, env),
  };
}

/**
 * An immutable chain of per-partition stages. `I` is the element type the
 * first stage reads and `O` the type the last stage emits.
 *
 * Functions are captured by source plus an explicit environment, so every
 * upvalue a stage reads must be passed in `env`:
 *
 *   const min = 5;
 *   Command.filter((v: number) => v >= min, { min });
 */
export class Command<I, O> {
  readonly stage: StagePayload;
  readonly predecessor: Command<I, unknown> | null;

  private constructor(
    stage: StagePayload,
    predecessor: Command<I, unknown> | null,
  ) {
    this.stage = stage;
    this.predecessor = predecessor;
  }

  static map<I, O>(func: (v: I) => O, env?: FunctionEnv): Command<I, O> {
    return new Command<I, O>(toStage('map', func, env), null);
  }

  static flatMap<I, O>(
    func: (v: I) => Iterable<O>,
    env?: FunctionEnv,
  ): Command<I, O> {
    return new Command<I, O>(toStage('flatMap', func, env), null);
  }

  static filter<I>(func: (v: I) => boolean, env?: FunctionEnv): Command<I, I> {
    return new Command<I, I>(toStage('filter', func, env), null);
  }

  static mapPartitions<I, O>(
    func: (v: I[]) => Awaitable<Iterable<O>>,
    env?: FunctionEnv,
  ): Command<I, O> {
    return new Command<I, O>(toStage('mapPartitions', func, env), null);
  }

  static mapPartitionsWithIndex<I, O>(
    func: (v: I[], partitionIndex: number) => Awaitable<Iterable<O>>,
    env?: FunctionEnv,
  ): Command<I, O> {
    return new Command<I, O>(
      toStage('mapPartitionsWithIndex', func, env),
      null,
    );
  }

  // Append every stage of `next` after this chain.
  then<O2>(next: Command<O, O2>): Command<I, O2> {
    const stages = next.stages();
    let chain: Command<I, unknown> = this;
    for (const stage of stages.slice(0, -1)) {
      chain = new Command<I, unknown>(stage, chain);
    }
    return new Command<I, O2>(stages[stages.length - 1], chain);
  }

  get length(): number {
    return this.predecessor ? this.predecessor.length + 1 : 1;
  }

  stages(): StagePayload[] {
    const ret: StagePayload[] = [];
    for (let c: Command<I, unknown> | null = this; c; c = c.predecessor) {
      ret.push(c.stage);
    }
    return ret.reverse();
  }

  toPayload(deserializer: Serializer, serializer: Serializer): CommandPayload {
    return {
      stages: this.stages(),
      deserializer: deserializer.descriptor(),
      serializer: serializer.descriptor(),
    };
  }
}
