export { BackendHttpClient, parseResponseBody } from './backend-http-client.js';
export type {
  BackendRequest,
  BackendResponse,
  BackendHttpClientOptions,
  HttpMethod,
} from './backend-http-client.js';
