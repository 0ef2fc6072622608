export { HttpTransport } from './HttpTransport';
export { MockTransport } from './MockTransport';
export { ITransport, QueryParams, TransportOptions } from '../interfaces/Transport';
