import { randomUUID } from "node:crypto";
import {
  CanvasStore,
  CanvasWriter,
  ReviewProofWriter,
  UserStore,
  UserWriter,
} from "../../adapter/storage/sqlite";
import { isOnCanvas, isPaletteColor, paintAwardFor } from "../../core/canvas/canvas.rules";
import {
  insufficientPaint,
  invalidInput,
  notFound,
  rateLimited,
} from "../../core/errors/core.errors";
import type { RouteDefinition, RouteMatch } from "./web.types";
import {
  parseIntegerParam,
  parsePaintRequest,
  parseReviewSubmission,
  parseUsername,
} from "./web.validation";

function toEpochSeconds(nowMs: number): number {
  return nowMs / 1000;
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    throw invalidInput(
      `VALIDATION_ERROR malformed path segment: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function assertOnCanvas(x: number, y: number): void {
  if (!isOnCanvas(x, y)) {
    throw invalidInput("Coordinates out of bounds");
  }
}

export const ROUTES: readonly RouteDefinition[] = [
  {
    name: "health",
    kind: "read",
    method: "GET",
    pattern: /^\/health$/,
    privileged: false,
    prepare: (ctx) => () => ({ status: "ok", queueDepth: ctx.deps.writer.queueDepth }),
  },
  {
    name: "canvas.read",
    kind: "read",
    method: "GET",
    pattern: /^\/canvas$/,
    privileged: false,
    prepare: () => (store) => ({ canvas: new CanvasStore(store).readGrid() }),
  },
  {
    name: "pixel.read",
    kind: "read",
    method: "GET",
    pattern: /^\/pixel\/([^/]+)\/([^/]+)$/,
    privileged: false,
    prepare: (ctx) => {
      const x = parseIntegerParam(ctx.params[0], "x");
      const y = parseIntegerParam(ctx.params[1], "y");
      assertOnCanvas(x, y);
      return (store) => {
        const pixel = new CanvasStore(store).getPixelDetails(x, y);
        if (pixel === undefined) {
          throw notFound("Pixel not found");
        }
        return {
          x: pixel.x,
          y: pixel.y,
          color: pixel.color,
          last_user_id: pixel.lastUserId,
          username: pixel.username,
          last_modified: pixel.lastModified,
        };
      };
    },
  },
  {
    name: "paint",
    kind: "write",
    method: "POST",
    pattern: /^\/paint$/,
    privileged: false,
    prepare: (ctx) => {
      const request = parsePaintRequest(ctx.body);
      assertOnCanvas(request.x, request.y);
      if (!isPaletteColor(request.color)) {
        throw invalidInput("Invalid color index (0-15)");
      }
      if (!ctx.deps.paintCooldown.tryAcquire(request.userId)) {
        throw rateLimited();
      }
      const modifiedAt = toEpochSeconds(ctx.nowMs);

      return (tx) => {
        const users = new UserWriter(tx);
        const user = users.getUser(request.userId);
        if (user === undefined) {
          throw notFound("User ID not found. Register first.");
        }
        if (user.paintBalance < 1) {
          throw insufficientPaint();
        }
        new CanvasWriter(tx).paint({ ...request, modifiedAt });
        users.adjustBalance(request.userId, -1);
        return { status: "success", x: request.x, y: request.y, color: request.color };
      };
    },
  },
  {
    name: "user.register",
    kind: "write",
    method: "POST",
    pattern: /^\/user$/,
    privileged: false,
    prepare: (ctx) => {
      const username = parseUsername(ctx.body);
      const userId = (ctx.deps.newId ?? randomUUID)();
      const createdAt = toEpochSeconds(ctx.nowMs);
      return (tx) => {
        new UserWriter(tx).insertUser({ userId, username, createdAt });
        return { user_id: userId, username };
      };
    },
  },
  {
    name: "reviews.submit",
    kind: "write",
    method: "POST",
    pattern: /^\/submit-reviews$/,
    privileged: true,
    prepare: (ctx) => {
      const submission = parseReviewSubmission(ctx.body);
      return (tx) => {
        const users = new UserWriter(tx);
        if (users.getUser(submission.userId) === undefined) {
          throw notFound("User not found");
        }

        const proofs = new ReviewProofWriter(tx);
        let newProofs = 0;
        for (const proof of submission.proofs) {
          const recorded = proofs.recordIfAbsent({
            userId: submission.userId,
            cardId: proof.cardId,
            timestamp: proof.timestamp,
          });
          if (recorded) {
            newProofs += 1;
          }
        }

        const paintAwarded = paintAwardFor(newProofs);
        if (paintAwarded > 0) {
          users.adjustBalance(submission.userId, paintAwarded);
        }
        return { status: "success", new_proofs: newProofs, paint_awarded: paintAwarded };
      };
    },
  },
  {
    name: "user.balance",
    kind: "read",
    method: "GET",
    pattern: /^\/user\/([^/]+)\/balance$/,
    privileged: false,
    prepare: (ctx) => {
      const userId = ctx.params[0] ?? "";
      return (store) => {
        const user = new UserStore(store).getUser(userId);
        if (user === undefined) {
          throw notFound("User not found");
        }
        return { user_id: user.userId, paint_balance: user.paintBalance };
      };
    },
  },
  {
    name: "user.read",
    kind: "read",
    method: "GET",
    pattern: /^\/user\/([^/]+)$/,
    privileged: false,
    prepare: (ctx) => {
      const userId = ctx.params[0] ?? "";
      return (store) => {
        const user = new UserStore(store).getUser(userId);
        if (user === undefined) {
          throw notFound("User not found");
        }
        return { user_id: user.userId, username: user.username, created_at: user.createdAt };
      };
    },
  },
];

export function matchRoute(
  method: string,
  pathname: string,
  routes: readonly RouteDefinition[] = ROUTES
): RouteMatch | undefined {
  for (const route of routes) {
    if (route.method !== method) {
      continue;
    }
    const match = route.pattern.exec(pathname);
    if (match) {
      return {
        route,
        params: match.slice(1).map((segment) => decodePathSegment(segment)),
      };
    }
  }
  return undefined;
}
