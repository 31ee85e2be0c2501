export {
  createHttpTransport,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  type HttpTransportConfig,
} from './transport.js';
