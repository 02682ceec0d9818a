export type {
  FetchFunction,
  HttpTransportConfig,
  RequestOptions,
  HttpResponse,
} from './http.js';

export { HttpTransport, hostToBaseUrl } from './http.js';
