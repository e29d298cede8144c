import { OptOutputFormat, parseOutputFormat, parseRegions } from "../cli.js";

describe("cli", () => {
  describe("parseOutputFormat", () => {
    it("should parse known formats", () => {
      expect(parseOutputFormat("text")).toBe(OptOutputFormat.Text);
      expect(parseOutputFormat("json")).toBe(OptOutputFormat.Json);
    });

    it("should handle case and whitespace", () => {
      expect(parseOutputFormat(" JSON ")).toBe(OptOutputFormat.Json);
    });

    it("should return undefined for unknown formats", () => {
      expect(parseOutputFormat("yaml")).toBeUndefined();
      expect(parseOutputFormat("")).toBeUndefined();
    });
  });

  describe("parseRegions", () => {
    it("should return no regions for empty input", () => {
      expect(parseRegions(undefined)).toEqual([]);
      expect(parseRegions("")).toEqual([]);
    });

    it("should split, trim and lowercase", () => {
      expect(parseRegions(" europe-west4 , US-CENTRAL1 ")).toEqual(["europe-west4", "us-central1"]);
    });

    it("should drop empty entries and duplicates", () => {
      expect(parseRegions("europe-west4,,europe-west4,us-east1")).toEqual(["europe-west4", "us-east1"]);
    });
  });
});
