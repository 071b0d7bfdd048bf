/**
 * @callbridge/bridge - Transports
 */

export {
  HttpTransport,
  createHttpTransport,
  type HttpTransportOptions,
  type FetchLike,
  type FetchRequestInit,
  type FetchResponseLike,
} from "./http.js";

export {
  MemoryTransport,
  createMemoryTransport,
  type MemoryMethod,
  type MemoryTransportOptions,
} from "./memory.js";
