// @ietfdata/protocol
// Resource kinds, typed URIs, entity types and decoders for the Datatracker API.
//
// Everything here is pure: no I/O and no throwing for bad input.
// Transport and traversal live in @ietfdata/transport and @ietfdata/client.

export * from './types/index.js';
export * from './errors.js';
export * from './uri/index.js';
export * from './decoding/index.js';
