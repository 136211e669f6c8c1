export { MockHttpClient } from './MockHttpClient';
export type { RecordedCall, StubOptions } from './MockHttpClient';
