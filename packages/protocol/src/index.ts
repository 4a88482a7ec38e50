export { IpcCodec, IpcEnvelopeSchema, IpcErrorSchema } from './ipc-codec.js';
export type { SerializationFormat, IpcEnvelope, IpcError, IpcCodecOptions } from './ipc-codec.js';
export {
  HEADER_SIZE,
  FLAG_FORMAT_MASK,
  FLAG_FORMAT_MSGPACK,
  FLAG_FORMAT_JSON,
  MAX_DATAGRAM_PAYLOAD,
} from './ipc-codec.js';

export {
  IPC_OPERATIONS,
  ObjectDefinitionSchema,
  ConnectResponseSchema,
  DefineRequestSchema,
  ClientGetRequestSchema,
  ClientGetResponseSchema,
  ClientSetRequestSchema,
  ServerReadRequestSchema,
  ServerReadResponseSchema,
  ServerWriteRequestSchema,
  ListClientsResponseSchema,
} from './operations.js';
export type {
  IpcOperation,
  ObjectDefinition,
  ConnectResponse,
  DefineRequest,
  ClientGetRequest,
  ClientGetResponse,
  ClientSetRequest,
  ServerReadRequest,
  ServerReadResponse,
  ServerWriteRequest,
  ListClientsResponse,
} from './operations.js';
