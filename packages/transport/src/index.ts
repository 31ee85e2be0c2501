// @ietfdata/transport
// The transport contract and its implementations.
//
// The client core never builds network addresses or talks to the network
// itself; it asks a Transport for documents by relative path.
//
// Key concepts:
// - Transport defines WHAT the core needs (one document per path), not HOW
// - createHttpTransport reaches the live service with the global fetch API
// - createInMemoryTransport serves canned documents for tests

export * from './interfaces/index.js';
export * from './http/index.js';
export {
  createInMemoryTransport,
  normalizePath,
  type CannedFailure,
  type InMemoryTransport,
} from './in-memory/index.js';
