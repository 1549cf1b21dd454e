import { describe, it, expect, vi, afterEach } from "vitest";
import { NixhubClient, parsePackageSpec } from "./nixhub.js";
import { ExitCodes, NixyError } from "./errors.js";

const fetchMock = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
  fetchMock.mockReset();
});

describe("parsePackageSpec", () => {
  it("splits name and version at the first @", () => {
    expect(parsePackageSpec("nodejs@20.1.0")).toEqual({ name: "nodejs", version: "20.1.0" });
    expect(parsePackageSpec("python3@3.11")).toEqual({ name: "python3", version: "3.11" });
    expect(parsePackageSpec("ripgrep")).toEqual({ name: "ripgrep" });
  });
});

describe("NixhubClient.search", () => {
  it("queries the search endpoint and maps results", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        query: "ripgrep",
        total_results: 1,
        results: [{ name: "ripgrep", summary: "Fast grep", last_updated: "2026-01-02" }],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const results = await new NixhubClient("https://search.example.test/").search("rip grep");
    expect(fetchMock.mock.calls[0][0]).toBe("https://search.example.test/v2/search?q=rip%20grep");
    expect(results).toEqual([{ name: "ripgrep", summary: "Fast grep", lastUpdated: "2026-01-02" }]);
  });

  it("treats null results as empty", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ query: "zzz", total_results: 0, results: null }));
    vi.stubGlobal("fetch", fetchMock);
    expect(await new NixhubClient().search("zzz")).toEqual([]);
  });

  it("rejects an empty query before any request", async () => {
    vi.stubGlobal("fetch", fetchMock);
    const error = await new NixhubClient().search("  ").catch((e: unknown) => e);
    expect(error instanceof NixyError && error.code).toBe(ExitCodes.Usage);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports an unreachable endpoint", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    vi.stubGlobal("fetch", fetchMock);
    await expect(new NixhubClient("https://search.example.test").search("x")).rejects.toThrow(
      "Could not reach Nixhub at https://search.example.test: fetch failed",
    );
  });
});

describe("NixhubClient.resolve", () => {
  const body = {
    name: "nodejs",
    version: "20.1.0",
    systems: {
      "x86_64-linux": {
        flake_installable: { ref: { type: "github", owner: "NixOS", repo: "nixpkgs", rev: "abc123def456" }, attr_path: "nodejs_20" },
        last_updated: "2026-01-01",
      },
    },
  };

  it("returns the attribute path and commit for the system", async () => {
    fetchMock.mockResolvedValue(jsonResponse(body));
    vi.stubGlobal("fetch", fetchMock);

    const release = await new NixhubClient("https://search.example.test").resolve("nodejs", "20", "x86_64-linux");
    expect(fetchMock.mock.calls[0][0]).toBe("https://search.example.test/v2/resolve?name=nodejs&version=20");
    expect(release).toEqual({
      name: "nodejs",
      version: "20.1.0",
      attribute_path: "nodejs_20",
      commit_hash: "abc123def456",
    });
  });

  it("fails for a system the release does not cover", async () => {
    fetchMock.mockResolvedValue(jsonResponse(body));
    vi.stubGlobal("fetch", fetchMock);
    await expect(new NixhubClient().resolve("nodejs", "20", "aarch64-darwin")).rejects.toThrow(
      "Cannot resolve nodejs@20: package not available for system 'aarch64-darwin'",
    );
  });

  it("maps 404 to a not-found error", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: "not found" }, 404));
    vi.stubGlobal("fetch", fetchMock);
    await expect(new NixhubClient().resolve("nodejs", "99", "x86_64-linux")).rejects.toThrow(
      "Version '99' of package 'nodejs' not found on Nixhub",
    );
  });

  it("rejects responses of the wrong shape", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ name: "nodejs" }));
    vi.stubGlobal("fetch", fetchMock);
    await expect(new NixhubClient().resolve("nodejs", "20", "x86_64-linux")).rejects.toThrow(
      /^Failed to parse Nixhub response/,
    );
  });
});
