/**
 * Mock implementations for testing the client in isolation.
 */

export {
  MockHttpClient,
  createMockFetch,
  type MockResponse,
  type MockStreamOptions,
  type RecordedRequest,
} from './http-client.js';
