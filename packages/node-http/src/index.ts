export { mapIncomingMessage, toHttpMethod, writeResponse } from "./request-mapper";
export type { MapRequestOptions, ResponseWriter } from "./request-mapper";
export {
  PlinthHttpServer,
  serve,
  createRequestListener,
  readBody,
  resolveListenAddress,
  DEFAULT_PORT,
  DEFAULT_BODY_LIMIT_BYTES,
} from "./server";
export type { RequestListenerOptions, ServeOptions } from "./server";
