//! The release hosting API as seen by the matrix builder and the reconciler.
//!
//! Calls never throw for remote failures; they return a `Result` whose error
//! carries a kind that callers switch on.

import { RemoteApiError } from "./errors.js";

export type ApiErrorKind = "notFound" | "unauthorized" | "rateLimited" | "api";

export type ApiError = {
  kind: ApiErrorKind;
  message: string;
  status?: number;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: ApiError };

export type ReleaseAsset = {
  id: number;
  name: string;
  downloadUrl: string;
};

export type Release = {
  id: number;
  tag: string;
  name: string;
  body: string;
  uploadUrl: string;
};

export type CreateReleaseParams = {
  tag: string;
  name: string;
  body: string;
};

export type UploadAssetParams = {
  name: string;
  data: Uint8Array;
  contentType: string;
};

export interface ReleaseApi {
  getReleaseByTag(tag: string): Promise<Result<Release>>;
  createRelease(params: CreateReleaseParams): Promise<Result<Release>>;
  listReleaseAssets(
    release: Release,
  ): Promise<Result<ReadonlyArray<ReleaseAsset>>>;
  uploadAsset(
    release: Release,
    params: UploadAssetParams,
  ): Promise<Result<ReleaseAsset>>;
  deleteAsset(asset: ReleaseAsset): Promise<Result<void>>;
  updateReleaseBody(release: Release, body: string): Promise<Result<Release>>;
}

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const err = <T = never>(error: ApiError): Result<T> => ({
  ok: false,
  error,
});

export const describeApiError = (error: ApiError): string => {
  switch (error.kind) {
    case "notFound":
      return `not found: ${error.message}`;
    case "unauthorized":
      return `invalid GitHub token or no access: ${error.message}`;
    case "rateLimited":
      return `GitHub API rate limit exceeded: ${error.message}`;
    case "api":
      return `GitHub API error: ${error.message}`;
  }
};

/// Returns the value or raises the error as a `RemoteApiError`.
export const unwrap = <T>(result: Result<T>, action: string): T => {
  if (result.ok) {
    return result.value;
  }
  throw new RemoteApiError(
    `Failed to ${action}: ${describeApiError(result.error)}`,
    result.error.kind,
    result.error.status,
  );
};
