import { describe, test, expect, beforeEach, afterEach } from "@jest/globals";
import path from "path";
import fs from "fs-extra";
import { selectCandidates } from "../packages/log-archive/src/index.js";
import { DAY, ago, makeTempDir, wholeSecondNow, writeAged } from "./helpers.js";

describe("selectCandidates", () => {
  let src: string;
  const now = wholeSecondNow();

  beforeEach(async () => {
    src = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(src);
  });

  test("selects every regular file recursively when no threshold is given", async () => {
    await writeAged(path.join(src, "b.log"), "b", ago(now, DAY));
    await writeAged(path.join(src, "a.log"), "a", ago(now, 10 * DAY));
    await writeAged(path.join(src, "nested/deep/c.log"), "ccc", now);
    await writeAged(path.join(src, ".hidden.log"), "h", now);

    const found = await selectCandidates(src, { now });

    expect(found.map((c) => c.relativePath)).toEqual([".hidden.log", "a.log", "b.log", "nested/deep/c.log"]);
    const deep = found[3];
    expect(deep.path).toBe(path.join(src, "nested", "deep", "c.log"));
    expect(deep.size).toBe(3);
    expect(deep.mtimeMs).toBe(now.getTime());
  });

  test("keeps files at least N days old and drops anything newer than the cutoff", async () => {
    const cutoff = ago(now, 5 * DAY);
    await writeAged(path.join(src, "at-cutoff.log"), "x", cutoff);
    await writeAged(path.join(src, "before-cutoff.log"), "x", ago(cutoff, 1000));
    await writeAged(path.join(src, "after-cutoff.log"), "x", new Date(cutoff.getTime() + 1000));
    await writeAged(path.join(src, "fresh.log"), "x", now);

    const found = await selectCandidates(src, { olderThanDays: 5, now });

    expect(found.map((c) => c.relativePath)).toEqual(["at-cutoff.log", "before-cutoff.log"]);
  });

  test("a zero-day threshold keeps everything not modified in the future", async () => {
    await writeAged(path.join(src, "now.log"), "x", now);
    await writeAged(path.join(src, "future.log"), "x", new Date(now.getTime() + 60_000));

    const found = await selectCandidates(src, { olderThanDays: 0, now });

    expect(found.map((c) => c.relativePath)).toEqual(["now.log"]);
  });

  test("never selects files under an excluded directory", async () => {
    const dest = path.join(src, "archives");
    await writeAged(path.join(src, "app.log"), "x", ago(now, 10 * DAY));
    await writeAged(path.join(dest, "logs_archive_20200101_000000.tar.gz"), "old", ago(now, 10 * DAY));
    await writeAged(path.join(dest, "archive_history.log"), "line", ago(now, 10 * DAY));
    await writeAged(path.join(dest, "nested/inner.log"), "x", ago(now, 10 * DAY));

    const found = await selectCandidates(src, { olderThanDays: 1, excludeDirs: [dest], now });

    expect(found.map((c) => c.relativePath)).toEqual(["app.log"]);
  });

  test("does not treat a sibling with a shared prefix as excluded", async () => {
    await writeAged(path.join(src, "archives-old/kept.log"), "x", now);
    await writeAged(path.join(src, "archives/skipped.log"), "x", now);

    const found = await selectCandidates(src, { excludeDirs: [path.join(src, "archives")], now });

    expect(found.map((c) => c.relativePath)).toEqual(["archives-old/kept.log"]);
  });

  test("excludes individual files such as a history log kept inside the source", async () => {
    await writeAged(path.join(src, "app.log"), "x", now);
    await writeAged(path.join(src, "history.log"), "x", now);

    const found = await selectCandidates(src, { excludeFiles: [path.join(src, "history.log")], now });

    expect(found.map((c) => c.relativePath)).toEqual(["app.log"]);
  });

  test("does not reach the destination through a link inside the source", async () => {
    const dest = path.join(src, "archives");
    await writeAged(path.join(src, "a.log"), "a", now);
    await writeAged(path.join(dest, "logs_archive_20200101_000000.tar.gz"), "old", now);
    await fs.symlink(dest, path.join(src, "dest-link"), "dir");

    const found = await selectCandidates(src, { excludeDirs: [dest], now });

    expect(found.map((c) => c.relativePath)).toEqual(["a.log"]);
  });

  test("does not descend into linked directories outside the source", async () => {
    const elsewhere = path.join(src, "..", `${path.basename(src)}-elsewhere`);
    await writeAged(path.join(src, "a.log"), "a", now);
    await writeAged(path.join(elsewhere, "precious.txt"), "keep me", now);
    await fs.symlink(elsewhere, path.join(src, "link"), "dir");

    try {
      const found = await selectCandidates(src, { now });
      expect(found.map((c) => c.relativePath)).toEqual(["a.log"]);
    } finally {
      await fs.remove(elsewhere);
    }
  });

  test("a link back to the source does not repeat files", async () => {
    await writeAged(path.join(src, "a.log"), "a", now);
    await fs.symlink(src, path.join(src, "loop"), "dir");

    const found = await selectCandidates(src, { now });

    expect(found.map((c) => c.relativePath)).toEqual(["a.log"]);
  });

  test("excludes the destination when it is named through a link", async () => {
    const dest = path.join(src, "archives");
    const alias = path.join(src, "..", `${path.basename(src)}-alias`);
    await writeAged(path.join(src, "a.log"), "a", now);
    await writeAged(path.join(dest, "archive_history.log"), "line", now);
    await fs.symlink(dest, alias, "dir");

    try {
      const found = await selectCandidates(src, { excludeDirs: [alias], now });
      expect(found.map((c) => c.relativePath)).toEqual(["a.log"]);
    } finally {
      await fs.remove(alias);
    }
  });

  test("returns an empty list for an empty directory", async () => {
    await expect(selectCandidates(src, { now })).resolves.toEqual([]);
  });
});
