export { NodeFetchClient, createNetworkClient } from './client.js';
export { HttpStatusError, ProbeStatusError, RangeNotHonouredError, TimeoutError } from './errors.js';
export type { NetworkClient, NetworkClientOptions, ProbeResponse, ResponseBody } from './types.js';
