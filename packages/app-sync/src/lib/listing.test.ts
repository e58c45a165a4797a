import { describe, it, expect } from "vitest";
import { findApplicationId, normalizeReferenceId, parseApplicationListing } from "./listing.js";
import { CLIError } from "./errors/types.js";

describe("listing", () => {
  describe("normalizeReferenceId", () => {
    it("strips the wcp_ prefix", () => {
      expect(normalizeReferenceId("wcp_foo_abc123")).toBe("foo_abc123");
    });

    it("keeps ids without the prefix", () => {
      expect(normalizeReferenceId(" foo_abc123 ")).toBe("foo_abc123");
    });
  });

  describe("parseApplicationListing", () => {
    it("parses a JSON array preceded by a banner line", () => {
      const stdout = [
        "Fetching applications for tenant test-tenant...",
        '[{"id": "987", "referenceId": "foo_abc123", "name": "Foo App"},',
        ' {"id": 654, "referenceId": "bar_def456"}]',
      ].join("\n");

      expect(parseApplicationListing(stdout)).toEqual([
        { id: "987", referenceId: "foo_abc123", name: "Foo App" },
        { id: "654", referenceId: "bar_def456" },
      ]);
    });

    it("does not mistake a bracketed log prefix for JSON", () => {
      const stdout = "[INFO] using stored session\n[]\n";

      expect(parseApplicationListing(stdout)).toEqual([]);
    });

    it("parses a text table with a rule line", () => {
      const stdout = [
        "ID    Reference ID     Name",
        "----  ---------------  -------------",
        "987   foo_abc123       Foo App",
        "654   bar_def456       Bar Inventory",
      ].join("\n");

      expect(parseApplicationListing(stdout)).toEqual([
        { id: "987", referenceId: "foo_abc123", name: "Foo App" },
        { id: "654", referenceId: "bar_def456", name: "Bar Inventory" },
      ]);
    });

    it("parses a boxed table with columns in any order", () => {
      const stdout = [
        "┌──────────────┬─────┬─────────┐",
        "│ referenceId  │ id  │ name    │",
        "├──────────────┼─────┼─────────┤",
        "│ foo_abc123   │ 987 │ Foo App │",
        "└──────────────┴─────┴─────────┘",
      ].join("\r\n");

      expect(parseApplicationListing(stdout)).toEqual([
        { id: "987", referenceId: "foo_abc123", name: "Foo App" },
      ]);
    });

    it("keeps empty cells of a bordered table in their column", () => {
      const stdout = [
        "| ID  | Reference ID | Name    |",
        "|-----|--------------|---------|",
        "| 111 |              | Foo App |",
        "| 222 | bar_def456   |         |",
      ].join("\n");

      expect(parseApplicationListing(stdout)).toEqual([{ id: "222", referenceId: "bar_def456" }]);
    });

    it("rejects numeric ids too large to keep every digit", () => {
      try {
        parseApplicationListing('[{"id": 12345678901234567891, "referenceId": "foo_abc123"}]');
        expect.unreachable("parseApplicationListing should throw");
      } catch (error) {
        expect((error as CLIError).code).toBe("CLI_OUTPUT_INVALID");
        expect((error as CLIError).details).toContain("0.id");
      }
    });

    it("rejects empty output", () => {
      expect(() => parseApplicationListing("  \n")).toThrow(CLIError);
    });

    it("rejects output with neither JSON nor a recognizable header", () => {
      try {
        parseApplicationListing("You are not logged in.\n");
        expect.unreachable("parseApplicationListing should throw");
      } catch (error) {
        expect((error as CLIError).code).toBe("CLI_OUTPUT_INVALID");
      }
    });

    it("rejects JSON entries without a reference id", () => {
      try {
        parseApplicationListing('[{"id": "987", "name": "Foo App"}]');
        expect.unreachable("parseApplicationListing should throw");
      } catch (error) {
        expect((error as CLIError).code).toBe("CLI_OUTPUT_INVALID");
        expect((error as CLIError).details).toContain("0.referenceId");
      }
    });

    it("rejects malformed JSON", () => {
      expect(() => parseApplicationListing('[{"id": "987",')).toThrow(
        'Unexpected output from "apps:list"'
      );
    });
  });

  describe("findApplicationId", () => {
    const entries = [
      { id: "987", referenceId: "foo_abc123", name: "Foo App" },
      { id: "654", referenceId: "bar_def456" },
    ];

    it("returns the id of the matching row", () => {
      expect(findApplicationId(entries, "bar_def456")).toBe("654");
    });

    it("fails with APP_NOT_FOUND when no row matches", () => {
      try {
        findApplicationId(entries, "baz_000000");
        expect.unreachable("findApplicationId should throw");
      } catch (error) {
        expect((error as CLIError).code).toBe("APP_NOT_FOUND");
        expect((error as CLIError).message).toBe('No application with reference id "baz_000000"');
      }
    });

    it("matches reference ids exactly", () => {
      expect(() => findApplicationId(entries, "FOO_ABC123")).toThrow(CLIError);
    });
  });
});
