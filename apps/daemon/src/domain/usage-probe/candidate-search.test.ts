import { describe, expect, it, vi } from "vitest";

import { UsageProbeError } from "../usage/usage-error";
import { expandPathCandidates, resolveBaseUrls, searchCandidates } from "./candidate-search";

describe("resolveBaseUrls", () => {
  it("drops blanks, trailing slashes and duplicates while keeping order", () => {
    expect(
      resolveBaseUrls([null, "https://proxy.test/", undefined, " ", "https://proxy.test", "https://api.test"]),
    ).toEqual(["https://proxy.test", "https://api.test"]);
  });
});

describe("expandPathCandidates", () => {
  it("tries every path of a base URL before the next base URL", () => {
    expect(expandPathCandidates(["https://a.test", "https://b.test"], ["/one", "/two"])).toEqual([
      { baseUrl: "https://a.test", pathname: "/one" },
      { baseUrl: "https://a.test", pathname: "/two" },
      { baseUrl: "https://b.test", pathname: "/one" },
      { baseUrl: "https://b.test", pathname: "/two" },
    ]);
  });

  it("accepts per-base-URL path lists", () => {
    const pathsFor = (baseUrl: string) => (baseUrl.includes("chat") ? ["/backend"] : ["/api", "/backend"]);

    expect(expandPathCandidates(["https://chat.test", "https://api.test"], pathsFor)).toEqual([
      { baseUrl: "https://chat.test", pathname: "/backend" },
      { baseUrl: "https://api.test", pathname: "/api" },
      { baseUrl: "https://api.test", pathname: "/backend" },
    ]);
  });
});

describe("searchCandidates", () => {
  it("returns the first recognized result", async () => {
    const attempt = vi.fn(async (candidate: string) => (candidate === "b" ? `hit:${candidate}` : null));

    await expect(searchCandidates(["a", "b", "c"], attempt)).resolves.toBe("hit:b");
    expect(attempt).toHaveBeenCalledTimes(2);
  });

  it("stops at the first unauthorized response", async () => {
    const attempt = vi.fn(async (candidate: string): Promise<string | null> => {
      if (candidate === "a") {
        throw new UsageProbeError("UNAUTHORIZED", "rejected", 401);
      }
      return candidate;
    });

    await expect(searchCandidates(["a", "b"], attempt)).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it("rethrows the last failure when nothing matched", async () => {
    const attempt = vi.fn(async (candidate: string): Promise<string | null> => {
      throw new UsageProbeError("HTTP_ERROR", `failed ${candidate}`, 500);
    });

    await expect(searchCandidates(["a", "b"], attempt)).rejects.toThrow("failed b");
    expect(attempt).toHaveBeenCalledTimes(2);
  });

  it("returns null when every candidate answered without data", async () => {
    await expect(searchCandidates(["a"], async () => null)).resolves.toBeNull();
  });
});
