export { MessageReader, trimCRLF } from './message-reader.js';
export type { FoldedLine, ByteSource, SourceChunk } from './message-reader.js';
