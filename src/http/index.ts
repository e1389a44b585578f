export type { ConnectionTimings, HostLookup, ResolvedAddress, TimedConnectorOptions } from "./connector";
export { ConnectTimeoutError, createTimedConnector } from "./connector";
export type { HttpProbeOptions } from "./probe";
export { createHttpProbe, effectiveTarget } from "./probe";
export type { HttpRequestOptions } from "./request";
export { RequestTimeoutError, httpRequest } from "./request";
export { withinDeadline } from "./deadline";
