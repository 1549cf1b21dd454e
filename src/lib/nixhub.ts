import { z } from "zod";
import { DEFAULT_SEARCH_ENDPOINT } from "./config/schema.js";
import { NixyError, ExitCodes, errorMessage, usageError } from "./errors.js";
import type { ResolvedRelease, SearchResult } from "./types.js";

// The API sends `null` for empty lists.
const nullableList = <T extends z.ZodType>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform((value) => value ?? []);

const SearchResponseSchema = z.object({
  query: z.string().optional(),
  total_results: z.number().optional(),
  results: nullableList(
    z.object({
      name: z.string(),
      summary: z
        .string()
        .nullish()
        .transform((value) => value ?? ""),
      last_updated: z.string().nullish(),
    }),
  ),
});

const ResolveResponseSchema = z.object({
  name: z.string(),
  version: z.string(),
  summary: z.string().nullish(),
  systems: z.record(
    z.string(),
    z.object({
      flake_installable: z.object({
        ref: z.object({ rev: z.string() }),
        attr_path: z.string(),
      }),
    }),
  ),
});

export interface PackageSpec {
  name: string;
  version?: string;
}

/** `nodejs@20.1.0` → name and version; a bare name has no version. */
export function parsePackageSpec(spec: string): PackageSpec {
  const at = spec.indexOf("@");
  if (at === -1) {
    return { name: spec };
  }
  return { name: spec.slice(0, at), version: spec.slice(at + 1) };
}

/** Package search and version resolution. */
export interface Registry {
  search(query: string): Promise<SearchResult[]>;
  resolve(name: string, version: string, system: string): Promise<ResolvedRelease>;
}

function registryError(message: string, cause?: unknown): NixyError {
  return new NixyError(message, ExitCodes.Failure, { cause });
}

export class NixhubClient implements Registry {
  private readonly host: string;

  constructor(host: string = DEFAULT_SEARCH_ENDPOINT) {
    this.host = host.replace(/\/+$/, "");
  }

  private async getJson(path: string, notFound: () => NixyError): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.host}${path}`, { headers: { accept: "application/json" } });
    } catch (error) {
      throw registryError(`Could not reach Nixhub at ${this.host}: ${errorMessage(error)}`, error);
    }
    if (response.status === 404) {
      throw notFound();
    }
    if (!response.ok) {
      throw registryError(`Nixhub API error: HTTP ${response.status}`);
    }
    try {
      return await response.json();
    } catch (error) {
      throw registryError(`Failed to parse Nixhub response: ${errorMessage(error)}`, error);
    }
  }

  async search(query: string): Promise<SearchResult[]> {
    if (query.trim().length === 0) {
      throw usageError("Search query cannot be empty");
    }
    const body = await this.getJson(`/v2/search?q=${encodeURIComponent(query)}`, () =>
      registryError(`No packages found matching '${query}'`),
    );
    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw registryError(`Failed to parse Nixhub response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
    }
    return parsed.data.results.map((result) => ({
      name: result.name,
      summary: result.summary,
      lastUpdated: result.last_updated ?? undefined,
    }));
  }

  async resolve(name: string, version: string, system: string): Promise<ResolvedRelease> {
    const query = `name=${encodeURIComponent(name)}&version=${encodeURIComponent(version)}`;
    const body = await this.getJson(`/v2/resolve?${query}`, () =>
      registryError(`Version '${version}' of package '${name}' not found on Nixhub`),
    );
    const parsed = ResolveResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw registryError(`Failed to parse Nixhub response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
    }
    const response = parsed.data;
    const info = response.systems[system];
    if (!info) {
      throw registryError(`Cannot resolve ${name}@${version}: package not available for system '${system}'`);
    }
    return {
      name: response.name,
      version: response.version,
      attribute_path: info.flake_installable.attr_path,
      commit_hash: info.flake_installable.ref.rev,
    };
  }
}
