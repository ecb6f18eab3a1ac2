export {
  REQUEST_ID_HEADER,
  SECRET_HEADER,
  createGatewayServer,
  startWebServer,
  type StartWebServerOptions,
} from "./web.server";
export { ROUTES, matchRoute } from "./web.routes";
export type {
  GatewayDeps,
  JsonObject,
  RouteContext,
  RouteDefinition,
  SecretVerifier,
} from "./web.types";
