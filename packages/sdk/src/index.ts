/**
 * @tokenwallet/sdk — HTTP clients for the tokens backend and the partition node.
 *
 * Both use native fetch; responses are validated against the wire schemas
 * from @tokenwallet/types before they reach the caller.
 *
 * @packageDocumentation
 */

// Types
export type { HttpClientConfig, HttpResponse, Pagination } from "./types.js";
export { RpcError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Clients
export { TokensBackendClient, DEFAULT_PAGE_SIZE } from "./backend-client.js";
export { PartitionRpcClient } from "./partition-client.js";
