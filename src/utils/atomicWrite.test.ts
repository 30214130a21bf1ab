import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceFailure } from "../errors.js";
import { makeTempDir, removeDir } from "../test/fakes.js";
import { commitArtifacts, nodeFileOps, writeFileAtomic, type FileOps } from "./atomicWrite.js";

describe("commitArtifacts", () => {
  let dir: string;
  let tempDir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    tempDir = path.join(dir, "temp");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("moves every artifact into place, creating target directories", async () => {
    const first = path.join(dir, "a", "one.json");
    const second = path.join(dir, "b", "two.txt");

    await commitArtifacts(
      [
        { name: "one", targetPath: first, render: () => '{"n":1}' },
        { name: "two", targetPath: second, render: async () => Buffer.from("two") },
      ],
      tempDir
    );

    expect(await fs.readFile(first, "utf8")).toBe('{"n":1}');
    expect(await fs.readFile(second, "utf8")).toBe("two");
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("leaves existing targets untouched when a render fails", async () => {
    const first = path.join(dir, "one.json");
    await fs.writeFile(first, "original");

    await expect(
      commitArtifacts(
        [
          { name: "one", targetPath: first, render: () => "replacement" },
          {
            name: "two",
            targetPath: path.join(dir, "two.json"),
            render: () => {
              throw new Error("render exploded");
            },
          },
        ],
        tempDir
      )
    ).rejects.toBeInstanceOf(PersistenceFailure);

    expect(await fs.readFile(first, "utf8")).toBe("original");
    expect(await fs.readdir(tempDir)).toEqual([]);
    await expect(fs.access(path.join(dir, "two.json"))).rejects.toThrow();
  });

  it("reports a failed move and removes the files not yet moved", async () => {
    let renames = 0;
    const ops: FileOps = {
      ...nodeFileOps,
      rename: async (from, to) => {
        renames++;
        if (renames === 2) throw new Error("disk full");
        await nodeFileOps.rename(from, to);
      },
    };

    await expect(
      commitArtifacts(
        [
          { name: "one", targetPath: path.join(dir, "one.json"), render: () => "1" },
          { name: "two", targetPath: path.join(dir, "two.json"), render: () => "2" },
        ],
        tempDir,
        ops
      )
    ).rejects.toThrow("Failed to move artifacts into place: disk full");

    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});

describe("writeFileAtomic", () => {
  it("replaces the file content", async () => {
    const dir = await makeTempDir();
    try {
      const target = path.join(dir, "index.json");
      await fs.writeFile(target, "old");

      await writeFileAtomic(target, "new");

      expect(await fs.readFile(target, "utf8")).toBe("new");
      expect(await fs.readdir(dir)).toEqual(["index.json"]);
    } finally {
      await removeDir(dir);
    }
  });
});
