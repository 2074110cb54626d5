export { createLoginServer } from "./server.js";
export type {
  HealthCheckResponse,
  LoginServerMetrics,
  LoginServerOptions,
  StoreHealthCheck,
  StoreHealthStatus,
} from "./server.js";

export { createLoginFetchHandler } from "./login-handler.js";
export type { LoginFetchHandlerOptions, LoginServiceLike } from "./login-handler.js";

export { parseLoginRequest } from "./login-request.js";
export type { LoginRequestBody } from "./login-request.js";

export { errorEnvelope, errorResponse, jsonResponse, successEnvelope } from "./envelope.js";
export type { EmptyPayload, LoginPayload, ResponseEnvelope } from "./envelope.js";

export {
  DEFAULT_MAX_BODY_BYTES,
  RequestBodyTooLargeError,
  createNodeRequestListener,
  handleNodeRequest,
  toFetchRequest,
} from "./node-adapter.js";
export type { FetchHandler, NodeAdapterOptions, NodeRequestLike, NodeResponseLike } from "./node-adapter.js";

export { loadLoginServerConfig } from "./config.js";
export type { LoginServerConfig, LoginServerEnvironment } from "./config.js";

export { createLoginRuntime } from "./runtime.js";
export type { CreateLoginRuntimeOptions, LoginRuntime, RedisConnectorLike } from "./runtime.js";
