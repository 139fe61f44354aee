import createDebug from 'debug';

export type DebugFunc = (msg: string, ...args: unknown[]) => void;

let debug: DebugFunc = () => {};

export function setDebugFunc(func: DebugFunc) {
  debug = func;
}

export function createLogger(namespace: string): DebugFunc {
  return createDebug(`pbridge:${namespace}`);
}

export default function(msg: string, ...args: unknown[]) {
  debug(msg, ...args);
}
