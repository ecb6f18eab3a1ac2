import type { ReadQuerier, WriteSubmitter } from "../../core/store/operation.types";
import type { ReadableStore, WritableStore } from "../../core/store/store.port";
import type { PaintCooldown } from "../../core/canvas/paint_cooldown";

export interface JsonObject {
  readonly [key: string]: unknown;
}

export type HttpMethod = "GET" | "POST";

export interface SecretVerifier {
  matches(candidate: string | undefined): boolean;
}

export interface GatewayDeps {
  readonly writer: WriteSubmitter;
  readonly reader: ReadQuerier;
  readonly secret: SecretVerifier;
  readonly paintCooldown: PaintCooldown;
  readonly requestDeadlineMs: number;
  readonly now?: () => number;
  readonly newId?: () => string;
}

export interface RouteContext {
  readonly params: readonly string[];
  readonly body: JsonObject;
  readonly nowMs: number;
  readonly deps: GatewayDeps;
}

interface RouteBase {
  readonly name: string;
  readonly method: HttpMethod;
  readonly pattern: RegExp;
  readonly privileged: boolean;
}

// `prepare` validates the request before any store access and returns the
// store-facing half of the work; the route kind alone decides where it runs.
export interface ReadRoute extends RouteBase {
  readonly kind: "read";
  prepare(ctx: RouteContext): (store: ReadableStore) => JsonObject;
}

export interface WriteRoute extends RouteBase {
  readonly kind: "write";
  prepare(ctx: RouteContext): (tx: WritableStore) => JsonObject | Promise<JsonObject>;
}

export type RouteDefinition = ReadRoute | WriteRoute;

export interface RouteMatch {
  readonly route: RouteDefinition;
  readonly params: readonly string[];
}
