import { CANVAS_PIXEL_COUNT, pixelIndex } from "../../../core/canvas/canvas.rules";
import type { ReadableStore, WritableStore } from "../../../core/store/store.port";

export interface PixelDetails {
  readonly x: number;
  readonly y: number;
  readonly color: number;
  readonly lastUserId: string | null;
  readonly username: string | null;
  readonly lastModified: number | null;
}

export interface PaintInput {
  readonly x: number;
  readonly y: number;
  readonly color: number;
  readonly userId: string;
  readonly modifiedAt: number;
}

export interface UserRecord {
  readonly userId: string;
  readonly username: string;
  readonly paintBalance: number;
  readonly createdAt: number;
}

export interface UserInsertInput {
  readonly userId: string;
  readonly username: string;
  readonly createdAt: number;
}

export interface ReviewProofInput {
  readonly userId: string;
  readonly cardId: number;
  readonly timestamp: number;
}

function toNullableString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function toNullableNumber(value: unknown): number | null {
  return typeof value === "number" ? value : null;
}

function fromUserRow(row: Record<string, unknown>): UserRecord {
  return {
    userId: String(row.user_id),
    username: String(row.username),
    paintBalance: Number(row.paint_balance),
    createdAt: Number(row.created_at),
  };
}

export class CanvasStore {
  constructor(private readonly storage: ReadableStore) {}

  readGrid(): number[] {
    const grid = new Array<number>(CANVAS_PIXEL_COUNT).fill(0);
    const rows = this.storage.query<{ x: unknown; y: unknown; color: unknown }>(
      "SELECT x, y, color FROM canvas"
    );
    for (const row of rows) {
      const index = pixelIndex(Number(row.x), Number(row.y));
      if (index >= 0 && index < CANVAS_PIXEL_COUNT) {
        grid[index] = Number(row.color);
      }
    }
    return grid;
  }

  getPixelDetails(x: number, y: number): PixelDetails | undefined {
    const row = this.storage.get<Record<string, unknown>>(
      `
      SELECT canvas.x, canvas.y, canvas.color, canvas.last_user_id, canvas.last_modified,
             users.username
      FROM canvas
      LEFT JOIN users ON canvas.last_user_id = users.user_id
      WHERE canvas.x = ? AND canvas.y = ?
      `,
      [x, y]
    );
    if (row === undefined) {
      return undefined;
    }
    return {
      x: Number(row.x),
      y: Number(row.y),
      color: Number(row.color),
      lastUserId: toNullableString(row.last_user_id),
      username: toNullableString(row.username),
      lastModified: toNullableNumber(row.last_modified),
    };
  }
}

export class CanvasWriter {
  constructor(private readonly storage: WritableStore) {}

  paint(input: PaintInput): void {
    const result = this.storage.exec(
      `
      UPDATE canvas
      SET color = ?, last_user_id = ?, last_modified = ?
      WHERE x = ? AND y = ?
      `,
      [input.color, input.userId, input.modifiedAt, input.x, input.y]
    );
    if (result.changes !== 1) {
      throw new Error(`CANVAS_STORE_ERROR pixel (${String(input.x)},${String(input.y)}) is missing`);
    }
  }
}

export class UserStore {
  constructor(private readonly storage: ReadableStore) {}

  getUser(userId: string): UserRecord | undefined {
    const row = this.storage.get<Record<string, unknown>>(
      "SELECT user_id, username, paint_balance, created_at FROM users WHERE user_id = ?",
      [userId]
    );
    return row === undefined ? undefined : fromUserRow(row);
  }
}

export class UserWriter extends UserStore {
  constructor(private readonly writable: WritableStore) {
    super(writable);
  }

  insertUser(user: UserInsertInput): void {
    this.writable.exec(
      "INSERT INTO users (user_id, username, paint_balance, created_at) VALUES (?, ?, 0, ?)",
      [user.userId, user.username, user.createdAt]
    );
  }

  adjustBalance(userId: string, delta: number): void {
    this.writable.exec("UPDATE users SET paint_balance = paint_balance + ? WHERE user_id = ?", [
      delta,
      userId,
    ]);
  }
}

export class ReviewProofWriter {
  constructor(private readonly storage: WritableStore) {}

  /** Returns true when the proof was not recorded before. */
  recordIfAbsent(proof: ReviewProofInput): boolean {
    const result = this.storage.exec(
      `
      INSERT INTO review_proofs (user_id, card_id, timestamp)
      VALUES (?, ?, ?)
      ON CONFLICT(user_id, card_id, timestamp) DO NOTHING
      `,
      [proof.userId, proof.cardId, proof.timestamp]
    );
    return result.changes === 1;
  }
}
