import debug from './debug';

type AnyFunction = (...args: never[]) => unknown;

interface SubFunction {
  name: string;
  source: string;
}

export interface SerializedFunctionStruct {
  __isFunction: true;
  source: string;
  args: string[];
  values: unknown[];
  functions: SubFunction[];
}

export interface RequireMarker {
  __isRequire: true;
  module: string;
}

export interface BroadcastMarker {
  __isBroadcast: true;
  id: number;
}

export interface ShippedFileMarker {
  __isShippedFile: true;
  name: string;
  // The absolute path on the engine; inside a stage the marker is that string.
  valueOf(): string;
}

// Same trick as SerializedFunction: typed as the module it becomes after
// deserialize, but only a marker until then.
export type RequiredModule<T> = T & RequireMarker;

// Make serialized function seems callable, for better usage with upvalue functions.
// But this could cause a error when you call it before serialize & deserialize.
export type SerializedFunction<T extends AnyFunction> = T &
  SerializedFunctionStruct;

export type FunctionEnv = { [key: string]: unknown };

export interface DeserializeOptions {
  resolveBroadcast?: (id: number) => unknown;
  // Absolute path of a file shipped with `addFile`.
  resolveFile?: (name: string) => string;
}

function isObject(v: unknown): v is { [key: string]: unknown } {
  return typeof v === 'object' && v !== null;
}

export function isSerializedFunction(v: unknown): v is SerializedFunctionStruct {
  return isObject(v) && v.__isFunction === true;
}

function isRequireMarker(v: unknown): v is RequireMarker {
  return isObject(v) && v.__isRequire === true;
}

export function isBroadcastMarker(v: unknown): v is BroadcastMarker {
  return isObject(v) && v.__isBroadcast === true && typeof v.id === 'number';
}

function isShippedFileMarker(
  v: unknown,
): v is Pick<ShippedFileMarker, '__isShippedFile' | 'name'> {
  return (
    isObject(v) && v.__isShippedFile === true && typeof v.name === 'string'
  );
}

export function serialize<T extends AnyFunction>(
  f: T,
  env?: FunctionEnv,
): SerializedFunction<T> {
  const args: string[] = [];
  const values: unknown[] = [];
  const functions: SubFunction[] = [];

  if (env) {
    for (const key of Object.keys(env)) {
      const value = env[key];
      if (typeof value === 'function') {
        functions.push({
          name: key,
          source: value.toString(),
        });
      } else if (isBroadcastMarker(value)) {
        // Only the id travels; the engine holds the value.
        args.push(key);
        values.push({ __isBroadcast: true, id: value.id });
      } else if (isShippedFileMarker(value)) {
        args.push(key);
        values.push({ __isShippedFile: true, name: value.name });
      } else {
        args.push(key);
        values.push(value);
      }
    }
  }

  const struct: SerializedFunctionStruct = {
    __isFunction: true,
    source: f.toString(),
    args,
    values,
    functions,
  };
  return struct as SerializedFunction<T>;
}

export function requireModule<T = unknown>(module: string): RequiredModule<T> {
  const marker: RequireMarker = {
    __isRequire: true,
    module,
  };
  return marker as RequiredModule<T>;
}

// Refer to a file passed to `Context.addFile` from inside a stage.
export function shippedFile(name: string): ShippedFileMarker {
  return {
    __isShippedFile: true,
    name,
    valueOf() {
      return name;
    },
  };
}

function wrap(f: (...args: unknown[]) => unknown) {
  return function(...args: unknown[]) {
    try {
      return f(...args);
    } catch (e) {
      console.error(`In function: ${f.toString()}`);
      throw e;
    }
  };
}

// esbuild's keepNames helper, referenced by sources compiled with it.
function keepName<T>(target: T): T {
  return target;
}

function resolveValue(v: unknown, opts: DeserializeOptions): unknown {
  if (isSerializedFunction(v)) {
    return deserialize(v, opts);
  }
  if (isRequireMarker(v)) {
    return require(v.module);
  }
  if (isBroadcastMarker(v)) {
    if (!opts.resolveBroadcast) {
      throw new Error(`Broadcast ${v.id} is not available here.`);
    }
    return opts.resolveBroadcast(v.id);
  }
  if (isShippedFileMarker(v)) {
    if (!opts.resolveFile) {
      throw new Error(`File ${v.name} is not available here.`);
    }
    return opts.resolveFile(v.name);
  }
  return v;
}

export function deserialize<T extends AnyFunction>(
  f: SerializedFunctionStruct,
  opts: DeserializeOptions = {},
): T {
  return new Function(
    'debug',
    'wrap',
    '__name',
    ...f.args,
    f.functions
      .map(v => `var ${v.name} = (function(){return wrap(${v.source});})();\n`)
      .join('') +
      'return wrap(' +
      f.source +
      ')',
  )(debug, wrap, keepName, ...f.values.map(v => resolveValue(v, opts)));
}
