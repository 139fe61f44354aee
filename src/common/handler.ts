import type { MasterServer } from '../master/MasterServer';
import { PayloadOf, Request, RequestType, ResultOf } from './protocol';

export type RequestHandler<K extends RequestType> = (
  payload: PayloadOf<K>,
  context: MasterServer,
) => ResultOf<K> | Promise<ResultOf<K>>;

type HandlerRegistry<T extends RequestType = RequestType> = {
  [K in T]?: RequestHandler<K>;
};

const registry: HandlerRegistry = {};

export function registerHandler<K extends RequestType>(
  key: K,
  handler: RequestHandler<K>,
) {
  const handlers: HandlerRegistry<K> = registry;
  if (handlers[key]) {
    throw new Error(`Duplicated handler registered for ${key}`);
  }
  handlers[key] = handler;
}

export async function processRequest<K extends RequestType>(
  req: Request<K>,
  context: MasterServer,
): Promise<ResultOf<K>> {
  const handler = registry[req.type];
  if (!handler) {
    throw new Error(`No registered handler for ${req.type}`);
  }
  return handler(req.payload, context);
}
