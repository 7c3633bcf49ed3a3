import { describe, expect, it } from "vitest";
import { ConfigError } from "./errors.js";
import {
  classifyError,
  octokitReleaseApi,
  parseRepository,
} from "./octokitReleaseApi.js";
import type { Release } from "./releaseApi.js";

type Reply = {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
};

type SeenRequest = {
  method: string;
  url: string;
  headers: Record<string, string>;
};

// A fetch answering every request through `respond`, without any network.
const stubFetch = (respond: (request: SeenRequest) => Reply) => {
  const seen: SeenRequest[] = [];
  const fetch: typeof globalThis.fetch = async (input, init) => {
    const request: SeenRequest = {
      method: init?.method ?? "GET",
      url: input instanceof Request ? input.url : String(input),
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
    };
    seen.push(request);
    const { status, body, headers = {} } = respond(request);
    return new Response(body === undefined ? null : JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json", ...headers },
    });
  };
  return { fetch, seen };
};

const repository = { owner: "tamatebako", repo: "tebako-runtime-ruby" };
const api = "https://api.github.com/repos/tamatebako/tebako-runtime-ruby";

const rawAsset = (id: number, name: string) => ({
  id,
  name,
  browser_download_url: `https://github.com/tamatebako/tebako-runtime-ruby/releases/download/v0.12.5/${name}`,
});

const rawRelease = {
  id: 7,
  tag_name: "v0.12.5",
  name: "Tebako runtime packages v0.12.5",
  body: null,
  upload_url:
    "https://uploads.github.com/repos/tamatebako/tebako-runtime-ruby/releases/7/assets{?name,label}",
  assets: [rawAsset(70, "tebako-ruby-0.12.5-3.4.1-windows-x64")],
};

const release: Release = {
  id: 7,
  tag: "v0.12.5",
  name: "Tebako runtime packages v0.12.5",
  body: "",
  uploadUrl: rawRelease.upload_url,
};

describe("octokitReleaseApi", () => {
  it("maps a release found by tag", async () => {
    const { fetch, seen } = stubFetch(() => ({ status: 200, body: rawRelease }));

    const result = await octokitReleaseApi({ repository, fetch }).getReleaseByTag(
      "v0.12.5",
    );

    expect(seen.map(({ method, url }) => [method, url])).toEqual([
      ["GET", `${api}/releases/tags/v0.12.5`],
    ]);
    expect(result).toEqual({
      ok: true,
      value: {
        id: 7,
        tag: "v0.12.5",
        name: "Tebako runtime packages v0.12.5",
        body: "",
        uploadUrl: rawRelease.upload_url,
      },
    });
  });

  it("sends the token", async () => {
    const { fetch, seen } = stubFetch(() => ({ status: 200, body: rawRelease }));

    await octokitReleaseApi({
      repository,
      token: "test-token",
      fetch,
    }).getReleaseByTag("v0.12.5");

    expect(seen[0]?.headers["authorization"]).toBe("token test-token");
  });

  it("reports a missing release as notFound", async () => {
    const { fetch } = stubFetch(() => ({
      status: 404,
      body: { message: "Not Found" },
    }));

    const result = await octokitReleaseApi({ repository, fetch }).getReleaseByTag(
      "v9.9.9",
    );

    expect(result).toMatchObject({
      ok: false,
      error: { kind: "notFound", status: 404 },
    });
  });

  it("reports an exhausted rate limit as rateLimited", async () => {
    const { fetch } = stubFetch(() => ({
      status: 403,
      body: { message: "API rate limit exceeded" },
      headers: { "x-ratelimit-remaining": "0" },
    }));

    const result = await octokitReleaseApi({ repository, fetch }).getReleaseByTag(
      "v0.12.5",
    );

    expect(result).toMatchObject({
      ok: false,
      error: { kind: "rateLimited", status: 403 },
    });
  });

  it("reports a rejected token as unauthorized", async () => {
    const { fetch } = stubFetch(() => ({
      status: 401,
      body: { message: "Bad credentials" },
    }));

    const result = await octokitReleaseApi({
      repository,
      token: "test-token",
      fetch,
    }).createRelease({ tag: "v0.12.5", name: "n", body: "b" });

    expect(result).toMatchObject({
      ok: false,
      error: { kind: "unauthorized", status: 401 },
    });
  });

  it("reports other failures as api errors", async () => {
    const { fetch } = stubFetch(() => ({
      status: 403,
      body: { message: "Resource not accessible by integration" },
      headers: { "x-ratelimit-remaining": "4999" },
    }));

    const result = await octokitReleaseApi({ repository, fetch }).deleteAsset({
      id: 70,
      name: "x",
      downloadUrl: "https://example.test/x",
    });

    expect(result).toMatchObject({
      ok: false,
      error: { kind: "api", status: 403 },
    });
  });

  it("creates a release for the tag", async () => {
    const { fetch, seen } = stubFetch(() => ({ status: 201, body: rawRelease }));

    const result = await octokitReleaseApi({ repository, fetch }).createRelease({
      tag: "v0.12.5",
      name: "Tebako runtime packages v0.12.5",
      body: "notes",
    });

    expect(seen.map(({ method, url }) => [method, url])).toEqual([
      ["POST", `${api}/releases`],
    ]);
    expect(result.ok && result.value.id).toBe(7);
  });

  it("reads every page of assets", async () => {
    const { fetch, seen } = stubFetch(({ url }) => {
      const page = new URL(url).searchParams.get("page");
      const body =
        page === "1"
          ? Array.from({ length: 100 }, (_, i) => rawAsset(i, `pkg-${i}`))
          : [rawAsset(100, "pkg-100")];
      return { status: 200, body };
    });

    const result = await octokitReleaseApi({
      repository,
      fetch,
    }).listReleaseAssets(release);

    expect(
      seen.map(({ url }) => new URL(url).searchParams.get("page")),
    ).toEqual(["1", "2"]);
    expect(result.ok && result.value.map((asset) => asset.name).at(-1)).toBe(
      "pkg-100",
    );
    expect(result.ok && result.value.length).toBe(101);
  });

  it("uploads to the release upload url", async () => {
    const { fetch, seen } = stubFetch(() => ({
      status: 201,
      body: rawAsset(71, "tebako-ruby-0.12.5-3.4.1-macos14-arm64"),
    }));

    const result = await octokitReleaseApi({ repository, fetch }).uploadAsset(
      release,
      {
        name: "tebako-ruby-0.12.5-3.4.1-macos14-arm64",
        data: new Uint8Array([1, 2, 3]),
        contentType: "application/octet-stream",
      },
    );

    expect(seen.map(({ method }) => method)).toEqual(["POST"]);
    const url = new URL(seen[0]?.url ?? "");
    expect(`${url.origin}${url.pathname}`).toBe(
      "https://uploads.github.com/repos/tamatebako/tebako-runtime-ruby/releases/7/assets",
    );
    expect([...url.searchParams]).toEqual([
      ["name", "tebako-ruby-0.12.5-3.4.1-macos14-arm64"],
    ]);
    expect(seen[0]?.headers["content-type"]).toBe("application/octet-stream");
    expect(result).toEqual({
      ok: true,
      value: {
        id: 71,
        name: "tebako-ruby-0.12.5-3.4.1-macos14-arm64",
        downloadUrl: rawAsset(71, "tebako-ruby-0.12.5-3.4.1-macos14-arm64")
          .browser_download_url,
      },
    });
  });

  it("updates the release body", async () => {
    const { fetch, seen } = stubFetch(() => ({
      status: 200,
      body: { ...rawRelease, body: "new notes" },
    }));

    const result = await octokitReleaseApi({
      repository,
      fetch,
    }).updateReleaseBody(release, "new notes");

    expect(seen.map(({ method, url }) => [method, url])).toEqual([
      ["PATCH", `${api}/releases/7`],
    ]);
    expect(result.ok && result.value.body).toBe("new notes");
  });
});

describe("classifyError", () => {
  it("treats anything thrown outside a request as an api error", () => {
    expect(classifyError(new Error("boom"))).toEqual({
      kind: "api",
      message: "boom",
    });
  });
});

describe("parseRepository", () => {
  it("splits owner and name", () => {
    expect(parseRepository("tamatebako/tebako-runtime-ruby")).toEqual(
      repository,
    );
  });

  it("refuses anything else", () => {
    expect(() => parseRepository("tebako-runtime-ruby")).toThrow(ConfigError);
    expect(() => parseRepository("a/b/c")).toThrow(ConfigError);
  });
});
