import { describe, it, expect } from "vitest";
import { extractCandidatePath, toHttpMethod } from "../pathExtractor";

describe("PathExtractor", () => {
  describe("toHttpMethod", () => {
    it("should keep GET and HEAD", () => {
      expect(toHttpMethod("GET")).toBe("GET");
      expect(toHttpMethod("HEAD")).toBe("HEAD");
    });

    it("should collapse every other method to OTHER", () => {
      expect(toHttpMethod("POST")).toBe("OTHER");
      expect(toHttpMethod("DELETE")).toBe("OTHER");
      expect(toHttpMethod("get")).toBe("OTHER");
      expect(toHttpMethod(undefined)).toBe("OTHER");
    });
  });

  describe("extractCandidatePath", () => {
    it("should map the root path to index.html", () => {
      expect(extractCandidatePath({ method: "GET", path: "/" })).toBe("index.html");
      expect(extractCandidatePath({ method: "HEAD", path: "/" })).toBe("index.html");
    });

    it("should strip exactly one leading slash", () => {
      expect(extractCandidatePath({ method: "GET", path: "/a/b.txt" })).toBe("a/b.txt");
      expect(extractCandidatePath({ method: "GET", path: "//etc/passwd" })).toBe("/etc/passwd");
      expect(extractCandidatePath({ method: "GET", path: "/%2e%2e/x" })).toBe("%2e%2e/x");
    });

    it("should not apply to other methods", () => {
      expect(extractCandidatePath({ method: "OTHER", path: "/a/b.txt" })).toBeNull();
    });

    it("should not apply when the path is unavailable", () => {
      expect(extractCandidatePath({ method: "GET", path: null })).toBeNull();
      expect(extractCandidatePath({ method: "GET", path: "" })).toBeNull();
    });
  });
});
