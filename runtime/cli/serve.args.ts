import { invalidInput } from "../../src/core/errors/core.errors";

export interface ServeArgs {
  dbPath?: string;
  host?: string;
  port?: number;
}

export function parseServeArgs(argv: readonly string[]): ServeArgs {
  const args: ServeArgs = {};

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--") {
      continue;
    }
    if (token === "--db") {
      const next = argv[i + 1];
      if (typeof next === "string" && next.trim() !== "") {
        args.dbPath = next;
        i += 1;
        continue;
      }
    }
    if (token === "--host") {
      const next = argv[i + 1];
      if (typeof next === "string" && next.trim() !== "") {
        args.host = next.trim();
        i += 1;
        continue;
      }
    }
    if (token === "--port") {
      const next = argv[i + 1];
      if (typeof next === "string" && next.trim() !== "") {
        const parsed = Number(next);
        if (Number.isInteger(parsed) && parsed > 0 && parsed < 65536) {
          args.port = parsed;
          i += 1;
          continue;
        }
      }
    }
    throw invalidInput(
      `Unknown or incomplete argument "${String(token)}". Usage: serve [--db <path>] [--host <host>] [--port <port>]`
    );
  }

  return args;
}
