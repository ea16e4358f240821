import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { readJsonFile, writeJsonFileAtomic } from "./utils.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe("writeJsonFileAtomic", () => {
  it("lets concurrent writers of one file each finish without leaving temp files", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stagegate-utils-"));
    tempDirs.push(dir);
    const filePath = path.join(dir, "lease.json");

    await Promise.all(
      [1, 2, 3, 4].map((writer) => writeJsonFileAtomic(filePath, { writer })),
    );

    const stored = await readJsonFile(filePath);
    expect([1, 2, 3, 4].map((writer) => ({ writer }))).toContainEqual(stored);
    expect(fs.readdirSync(dir)).toEqual(["lease.json"]);
  });
});
