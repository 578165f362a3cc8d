import { describe, it, expect } from "vitest";
import fs from "fs-extra";
import os from "os";
import path from "path";
import { withTempFile } from "./temp-file";

describe("withTempFile", () => {
  it("hands out a path in a private directory and removes it afterwards", async () => {
    let seen = "";

    const result = await withTempFile("temp-file-test", "key.json", async (filePath) => {
      seen = filePath;
      await fs.writeFile(filePath, "secret");
      const stat = await fs.stat(path.dirname(filePath));
      return { mode: stat.mode & 0o777, content: await fs.readFile(filePath, "utf-8") };
    });

    expect(result).toEqual({ mode: 0o700, content: "secret" });
    expect(path.basename(seen)).toBe("key.json");
    expect(path.dirname(path.dirname(seen))).toBe(path.resolve(os.tmpdir()));
    expect(await fs.pathExists(path.dirname(seen))).toBe(false);
  });

  it("removes the directory when the callback throws", async () => {
    let seen = "";

    await expect(
      withTempFile("temp-file-test", "key.json", async (filePath) => {
        seen = filePath;
        await fs.writeFile(filePath, "secret");
        throw new Error("gcloud failed");
      })
    ).rejects.toThrow("gcloud failed");

    expect(await fs.pathExists(path.dirname(seen))).toBe(false);
  });

  it("detaches its signal handlers once done", async () => {
    const before = process.listenerCount("SIGINT");

    await withTempFile("temp-file-test", "key.json", async () => {
      expect(process.listenerCount("SIGINT")).toBe(before + 1);
    });

    expect(process.listenerCount("SIGINT")).toBe(before);
  });
});
