import { mkdtemp, readdir, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { ArtifactStore } from "./artifact-store";
import { ValidationError } from "./errors";

describe("ArtifactStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "artifacts-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("stores, reads back and removes an artifact", async () => {
    const store = new ArtifactStore(dir);
    const ref = await store.put("blind", Buffer.from("img"));

    expect(ref.id).toMatch(/^blind_[0-9a-f-]{36}\.png$/);
    expect(ref.path).toBe(path.join(dir, ref.id));
    expect(await store.get(ref.id)).toEqual(Buffer.from("img"));
    expect(await readdir(dir)).toEqual([ref.id]);

    await store.remove(ref.id);
    expect(await readdir(dir)).toEqual([]);
  });

  it("never reuses a name", async () => {
    const store = new ArtifactStore(dir);
    const a = await store.put("recovered", Buffer.from("a"));
    const b = await store.put("recovered", Buffer.from("b"));
    expect(a.id).not.toBe(b.id);
  });

  it("rejects ids that are not its own", async () => {
    const store = new ArtifactStore(dir);
    await expect(store.get("../secret.png")).rejects.toBeInstanceOf(ValidationError);
    await expect(store.remove("blind.png")).rejects.toBeInstanceOf(ValidationError);
  });

  it("leaves nothing behind when a write is aborted", async () => {
    const store = new ArtifactStore(dir);
    const controller = new AbortController();
    controller.abort();

    await expect(store.put("blind", Buffer.from("img"), "png", controller.signal)).rejects.toThrow();
    expect(await readdir(dir)).toEqual([]);
  });

  it("cleans up artifacts and interrupted writes past their age", async () => {
    const store = new ArtifactStore(dir);
    const day = 24 * 60 * 60 * 1000;
    const now = Date.now();
    const stale = new Date(now - 2 * day);

    const old = await store.put("blind", Buffer.from("old"));
    const fresh = await store.put("recovered", Buffer.from("new"));
    const tmp = ".blind_00000000-0000-0000-0000-000000000000.png.tmp";
    await writeFile(path.join(dir, tmp), "partial");
    await writeFile(path.join(dir, "notes.txt"), "keep me");
    for (const name of [old.id, tmp, "notes.txt"]) await utimes(path.join(dir, name), stale, stale);

    const removed = await store.cleanup(day, now);

    expect(removed.sort()).toEqual([tmp, old.id].sort());
    expect((await readdir(dir)).sort()).toEqual([fresh.id, "notes.txt"].sort());
  });

  it("has nothing to clean up before the first write", async () => {
    const store = new ArtifactStore(path.join(dir, "missing"));
    expect(await store.cleanup(0)).toEqual([]);
  });
});
