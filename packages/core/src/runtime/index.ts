export { createFetchTransport } from './fetch-transport';
export { createNodeIO } from './node-io';
export type { EngineEvent, EventSink, IO, PathApi, Transport } from './types';
