/**
 * Intent: persistence core lock: strict write order, no dirty reads, and durability of exactly the committed writes.
 * Scope: openStoreRuntime (writer + read-only pool) against a temp canvas.db on disk.
 * Non-Goals: HTTP mapping (see web_server.test.ts).
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CanvasStore, CanvasWriter, SQLiteStorage, UserStore, UserWriter } from "../../src/adapter/storage/sqlite";
import { createOperationMeta } from "../../src/core/store/operation.types";
import type { ReadableStore } from "../../src/core/store/store.port";
import { openStoreRuntime, type StoreRuntime } from "../../runtime/store/store_runtime";

function createTempDir(t: test.TestContext, prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return dir;
}

function openRuntime(t: test.TestContext): { runtime: StoreRuntime; dbPath: string } {
  const dbPath = path.join(createTempDir(t, "core-props-"), "canvas.db");
  const runtime = openStoreRuntime({ dbPath, readPoolSize: 2 });
  t.after(async () => {
    await runtime.close(0);
  });
  return { runtime, dbPath };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function deferred(): { readonly promise: Promise<void>; readonly resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function meta(id: string): { id: string; deadline: number } {
  return createOperationMeta({ id, timeoutMs: 10_000 });
}

function readPixels(store: ReadableStore, coords: readonly (readonly [number, number])[]): number[] {
  const grid = new CanvasStore(store).readGrid();
  return coords.map(([x, y]) => grid[y * 32 + x] ?? -1);
}

function snapshotFiles(dbPath: string, targetDir: string): string {
  const target = path.join(targetDir, "canvas.db");
  fs.copyFileSync(dbPath, target);
  if (fs.existsSync(`${dbPath}-wal`)) {
    fs.copyFileSync(`${dbPath}-wal`, `${target}-wal`);
  }
  return target;
}

test("writes with their own internal delays still apply in submission order", async (t) => {
  const { runtime } = openRuntime(t);
  await runtime.writer.submit({
    kind: "write",
    ...meta("seed"),
    run: (tx) => new UserWriter(tx).insertUser({ userId: "u1", username: "", createdAt: 1 }),
  });

  const jitterMs = { A: 40, B: 0, C: 15 } as const;
  const appends = (["A", "B", "C"] as const).map((letter) =>
    runtime.writer.submit({
      kind: "write",
      ...meta(`append-${letter}`),
      run: async (tx) => {
        const current = new UserWriter(tx).getUser("u1")?.username ?? "";
        await delay(jitterMs[letter]);
        tx.exec("UPDATE users SET username = ? WHERE user_id = ?", [`${current}${letter}`, "u1"]);
        return letter;
      },
    })
  );
  await Promise.all(appends);

  const result = await runtime.readPool.query({
    kind: "read",
    ...meta("check"),
    run: (store) => new UserStore(store).getUser("u1")?.username,
  });
  assert.equal(result.value, "ABC");
});

test("writes submitted at scattered times are applied exactly in the order they arrived", async (t) => {
  const { runtime } = openRuntime(t);
  const submitted: number[] = [];
  const applied: number[] = [];
  const offsets = [7, 0, 13, 3, 3, 19, 1, 11, 5, 17, 2, 9];

  const pending = offsets.map(
    (offset, index) =>
      new Promise<void>((resolve, reject) => {
        setTimeout(() => {
          submitted.push(index);
          runtime.writer
            .submit({
              kind: "write",
              ...meta(`w${String(index)}`),
              run: async (tx) => {
                await delay(index % 3);
                tx.exec("UPDATE canvas SET color = ? WHERE x = 0 AND y = 0", [index % 16]);
                applied.push(index);
              },
            })
            .then(() => resolve(), reject);
        }, offset);
      })
  );
  await Promise.all(pending);

  assert.equal(applied.length, offsets.length);
  assert.deepEqual(applied, submitted);
});

test("fifty readers during a two-second two-statement write see all of it or none of it", async (t) => {
  const { runtime } = openRuntime(t);
  const coords = [
    [0, 0],
    [1, 0],
  ] as const;
  const firstStatementDone = deferred();

  const write = runtime.writer.submit({
    kind: "write",
    ...meta("paint-pair"),
    run: async (tx) => {
      const canvas = new CanvasWriter(tx);
      canvas.paint({ x: 0, y: 0, color: 5, userId: "painter", modifiedAt: 1 });
      firstStatementDone.resolve();
      await delay(2_000);
      canvas.paint({ x: 1, y: 0, color: 5, userId: "painter", modifiedAt: 1 });
    },
  });

  await firstStatementDone.promise;
  const reads = Array.from({ length: 50 }, async (_, index) => {
    await delay(index * 10);
    const result = await runtime.readPool.query({
      kind: "read",
      ...meta(`r${String(index)}`),
      run: (store) => readPixels(store, coords),
    });
    return result.value;
  });
  const observations = await Promise.all(reads);
  assert.equal(runtime.writer.queueDepth, 1);
  await write;
  const after = await runtime.readPool.query({
    kind: "read",
    ...meta("after"),
    run: (store) => readPixels(store, coords),
  });

  assert.equal(observations.length, 50);
  for (const seen of observations) {
    assert.deepEqual(seen, [0, 0]);
  }
  assert.deepEqual(after.value, [5, 5]);
});

test("a file copy taken mid-write holds every committed write and nothing uncommitted", async (t) => {
  const { runtime, dbPath } = openRuntime(t);

  await runtime.writer.submit({
    kind: "write",
    ...meta("committed"),
    run: (tx) =>
      new CanvasWriter(tx).paint({ x: 1, y: 1, color: 9, userId: "u1", modifiedAt: 1 }),
  });

  const painted = deferred();
  const release = deferred();
  const inFlight = runtime.writer.submit({
    kind: "write",
    ...meta("uncommitted"),
    run: async (tx) => {
      new CanvasWriter(tx).paint({ x: 2, y: 2, color: 4, userId: "u1", modifiedAt: 2 });
      painted.resolve();
      await release.promise;
    },
  });

  await painted.promise;
  const copyPath = snapshotFiles(dbPath, createTempDir(t, "core-crash-"));
  release.resolve();
  await inFlight;

  const recovered = new SQLiteStorage({ dbPath: copyPath });
  recovered.connect();
  t.after(() => recovered.close());

  assert.deepEqual(
    readPixels(recovered, [
      [1, 1],
      [2, 2],
    ]),
    [9, 0]
  );
});

test("after close the runtime refuses writes and reads", async (t) => {
  const { runtime } = openRuntime(t);
  await runtime.close(0);
  await runtime.close(0);

  await assert.rejects(
    runtime.writer.submit({ kind: "write", ...meta("late-write"), run: () => 1 }),
    { code: "UNAVAILABLE" }
  );
  await assert.rejects(
    runtime.readPool.query({ kind: "read", ...meta("late-read"), run: () => 1 }),
    { code: "UNAVAILABLE" }
  );
});
