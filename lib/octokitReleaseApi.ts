//! `ReleaseApi` on top of the GitHub REST API.

import { Octokit, type OctokitOptions } from "@octokit/core";
import type { RequestError } from "@octokit/request-error";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import {
  type ApiError,
  type ReleaseApi,
  type Release,
  type ReleaseAsset,
  type Result,
  err,
  ok,
} from "./releaseApi.js";

export type Repository = {
  owner: string;
  repo: string;
};

export const parseRepository = (slug: string): Repository => {
  const [owner, repo, ...rest] = slug.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigError(`Repository must look like "owner/name", got "${slug}"`);
  }
  return { owner, repo };
};

export type OctokitReleaseApiParams = {
  repository: Repository;
  token?: string;
  /// Passed to Octokit as `request.fetch`.
  fetch?: typeof globalThis.fetch;
};

const ASSETS_PER_PAGE = 100;

const assetSchema = z.object({
  id: z.number(),
  name: z.string(),
  browser_download_url: z.string(),
});

type RawAsset = z.infer<typeof assetSchema>;

type RawRelease = {
  id: number;
  tag_name: string;
  name: string | null;
  body?: string | null;
  upload_url: string;
};

const toAsset = (asset: RawAsset): ReleaseAsset => ({
  id: asset.id,
  name: asset.name,
  downloadUrl: asset.browser_download_url,
});

const toRelease = (release: RawRelease): Release => ({
  id: release.id,
  tag: release.tag_name,
  name: release.name ?? "",
  body: release.body ?? "",
  uploadUrl: release.upload_url,
});

const header = (
  headers: Record<string, unknown> | undefined,
  name: string,
): string | undefined => {
  const value = headers?.[name];
  return value === undefined ? undefined : String(value);
};

// Octokit raises `RequestError`s named "HttpError" for every failed request.
const isRequestError = (error: unknown): error is RequestError =>
  error instanceof Error &&
  error.name === "HttpError" &&
  "status" in error &&
  typeof error.status === "number";

/// Maps a thrown Octokit error to an `ApiError`.
export const classifyError = (error: unknown): ApiError => {
  if (!isRequestError(error)) {
    return {
      kind: "api",
      message: error instanceof Error ? error.message : String(error),
    };
  }

  const { status, message } = error;
  const headers = error.response?.headers;
  const rateLimitExhausted =
    header(headers, "x-ratelimit-remaining") === "0";

  if (status === 404) {
    return { kind: "notFound", message, status };
  }
  if (status === 401) {
    return { kind: "unauthorized", message, status };
  }
  if (status === 429 || (status === 403 && rateLimitExhausted)) {
    return { kind: "rateLimited", message, status };
  }
  return { kind: "api", message, status };
};

const attempt = async <T>(call: () => Promise<T>): Promise<Result<T>> => {
  try {
    return ok(await call());
  } catch (error) {
    return err(classifyError(error));
  }
};

/// The release's upload URL with its `{?name,label}` template replaced by
/// the asset name.
export const uploadUrl = (release: Release, name: string) => {
  const url = new URL(release.uploadUrl.replace(/\{[^}]*\}$/, ""));
  url.searchParams.set("name", name);
  return url.toString();
};

export const createOctokit = ({
  token,
  fetch,
}: Pick<OctokitReleaseApiParams, "token" | "fetch">): Octokit => {
  const options: OctokitOptions = token ? { auth: token } : {};
  if (fetch !== undefined) {
    options.request = { fetch };
  }
  return new Octokit(options);
};

export const octokitReleaseApi = (
  params: OctokitReleaseApiParams,
): ReleaseApi => {
  const octokit = createOctokit(params);
  const { owner, repo } = params.repository;

  const listAssets = async (releaseId: number) => {
    const assets: ReleaseAsset[] = [];
    for (let page = 1; ; page++) {
      const { data } = await octokit.request(
        "GET /repos/{owner}/{repo}/releases/{release_id}/assets",
        { owner, repo, release_id: releaseId, per_page: ASSETS_PER_PAGE, page },
      );
      assets.push(...data.map(toAsset));
      if (data.length < ASSETS_PER_PAGE) {
        return assets;
      }
    }
  };

  return {
    getReleaseByTag: (tag) =>
      attempt(async () => {
        const { data } = await octokit.request(
          "GET /repos/{owner}/{repo}/releases/tags/{tag}",
          { owner, repo, tag },
        );
        return toRelease(data);
      }),

    createRelease: ({ tag, name, body }) =>
      attempt(async () => {
        const { data } = await octokit.request(
          "POST /repos/{owner}/{repo}/releases",
          { owner, repo, tag_name: tag, name, body },
        );
        return toRelease(data);
      }),

    listReleaseAssets: (release) => attempt(() => listAssets(release.id)),

    uploadAsset: (release, { name, data, contentType }) =>
      attempt(async () => {
        const response = await octokit.request(
          `POST ${uploadUrl(release, name)}`,
          {
            data,
            headers: {
              "content-type": contentType,
              "content-length": data.byteLength,
            },
          },
        );
        return toAsset(assetSchema.parse(response.data));
      }),

    deleteAsset: (asset) =>
      attempt(async () => {
        await octokit.request(
          "DELETE /repos/{owner}/{repo}/releases/assets/{asset_id}",
          { owner, repo, asset_id: asset.id },
        );
      }),

    updateReleaseBody: (release, body) =>
      attempt(async () => {
        const { data } = await octokit.request(
          "PATCH /repos/{owner}/{repo}/releases/{release_id}",
          { owner, repo, release_id: release.id, body },
        );
        return toRelease(data);
      }),
  };
};
