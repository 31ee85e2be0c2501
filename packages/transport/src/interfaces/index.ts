export type {
  Transport,
  TransportFactory,
  TransportFailure,
  TransportRequestOptions,
  TransportResult,
} from './transport.js';
