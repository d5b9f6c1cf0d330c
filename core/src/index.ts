// Errors
export * from "./errors.js";

// Body
export { Body, mapBodyErrors, type HttpBody } from "./body.js";

// Request / response
export {
  ExtensionKey,
  Extensions,
  createRequest,
  requestPathname,
  type Request,
  type HeadersLike,
} from "./request.js";
export {
  createResponse,
  textResponse,
  htmlResponse,
  mapResponseBody,
  type HttpResponse,
  type Response,
} from "./response.js";

// Processing-unit contract
export {
  ServiceFn,
  serviceFn,
  oneshot,
  type Service,
  type Layer,
  type Handler,
} from "./service.js";

// Composition
export { identityLayer, stack, buildPipeline } from "./pipeline.js";

// Config schemas (runtime validation)
export {
  LiveReloadConfigSchema,
  SessionConfigSchema,
  MiddlewareConfigSchema,
  ProjectConfigSchema,
  defaultProjectConfig,
  type LiveReloadConfig,
  type SessionConfig,
  type MiddlewareConfig,
  type ProjectConfig,
} from "./config-schema.js";
