export { buildUrl, createApiClient } from './api-client.js';
export type {
  AccessTokenProvider,
  ApiCall,
  ApiClient,
  ApiClientConfig,
  ApiRequest,
  QueryValue,
} from './api-client.js';
export { ENDPOINTS } from './endpoints.js';
