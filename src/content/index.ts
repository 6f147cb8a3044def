export { ContentBody } from './ContentBody.js';
export type { ContentBodyOptions } from './ContentBody.js';
export type {
  ContentHeaders,
  ContentSink,
  ContentWriter,
  ReadStreamState,
  StreamHandle,
} from './types.js';
