export {
  createRequestHandler,
  parseChatStreamRequest,
  startWebServer,
  WebRequestError,
  type StartWebServerOptions,
  type WebErrorResponse,
} from "./web.server";
export { encodeSseEvent, toWireEvent } from "./web.sse";
export type {
  ChatStreamRequest,
  IChatSessionService,
  WebErrorDTO,
  WireEvent,
} from "./web.types";
