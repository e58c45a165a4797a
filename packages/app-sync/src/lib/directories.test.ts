import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, statSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ensureDirectory, validateDirectory } from "./directories.js";

describe("directories", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "app-sync-dirs-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("validateDirectory", () => {
    it("accepts an existing directory", () => {
      expect(() => validateDirectory(root, "App directory")).not.toThrow();
    });

    it("names the directory in the error when it is missing", () => {
      const missing = join(root, "missing");

      expect(() => validateDirectory(missing, "Download directory")).toThrow(
        `Download directory "${missing}" not found`
      );
    });

    it("rejects a file", () => {
      const file = join(root, "file.txt");
      writeFileSync(file, "");

      expect(() => validateDirectory(file, "App directory")).toThrow(
        expect.objectContaining({ code: "NOT_A_DIRECTORY" })
      );
    });
  });

  describe("ensureDirectory", () => {
    it("creates a missing directory, including parents", () => {
      const path = join(root, "foo", "src");

      expect(ensureDirectory(path, "Source directory")).toBe(true);
      expect(statSync(path).isDirectory()).toBe(true);
    });

    it("leaves an existing directory alone", () => {
      expect(ensureDirectory(root, "Source directory")).toBe(false);
      expect(existsSync(root)).toBe(true);
    });
  });
});
