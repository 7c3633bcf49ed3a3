//! In-memory `ReleaseApi` for tests. Records every call it receives.

import {
  type ApiError,
  type ReleaseApi,
  type Release,
  type ReleaseAsset,
  type Result,
  err,
  ok,
} from "./releaseApi.js";

export type FakeCall =
  | { op: "getReleaseByTag"; tag: string }
  | { op: "createRelease"; tag: string; name: string }
  | { op: "listReleaseAssets"; releaseId: number }
  | { op: "uploadAsset"; name: string; size: number }
  | { op: "deleteAsset"; name: string }
  | { op: "updateReleaseBody"; releaseId: number };

/// A stored release along with the assets it currently carries.
export type FakeRelease = Release & {
  assets: ReadonlyArray<ReleaseAsset>;
};

export type FakeReleaseApi = ReleaseApi & {
  calls: FakeCall[];
  releases: Map<string, FakeRelease>;
  /// Makes every call of the operation fail with the error.
  failWith: (op: FakeCall["op"], error: ApiError) => void;
};

export type FakeReleaseSeed = {
  tag: string;
  assets?: ReadonlyArray<string>;
};

export const assetUrl = (tag: string, name: string) =>
  `https://example.test/releases/download/${tag}/${name}`;

export const fakeReleaseApi = (
  ...seeds: ReadonlyArray<FakeReleaseSeed>
): FakeReleaseApi => {
  let nextId = 1;
  const calls: FakeCall[] = [];
  const releases = new Map<string, FakeRelease>();
  const failures = new Map<FakeCall["op"], ApiError>();

  const newAsset = (tag: string, name: string): ReleaseAsset => ({
    id: nextId++,
    name,
    downloadUrl: assetUrl(tag, name),
  });

  const newRelease = (
    tag: string,
    name: string,
    body: string,
  ): FakeRelease => {
    const id = nextId++;
    return {
      id,
      tag,
      name,
      body,
      uploadUrl: `https://uploads.example.test/releases/${id}/assets{?name,label}`,
      assets: [],
    };
  };

  for (const { tag, assets = [] } of seeds) {
    const release = newRelease(tag, tag, "");
    releases.set(tag, {
      ...release,
      assets: assets.map((name) => newAsset(tag, name)),
    });
  }

  const byId = (id: number) =>
    [...releases.values()].find((release) => release.id === id);

  const record = <T>(call: FakeCall, run: () => Result<T>): Promise<Result<T>> => {
    calls.push(call);
    const failure = failures.get(call.op);
    return Promise.resolve(failure === undefined ? run() : err(failure));
  };

  const missing = (what: string): ApiError => ({
    kind: "notFound",
    message: `${what} not found`,
    status: 404,
  });

  return {
    calls,
    releases,
    failWith: (op, error) => {
      failures.set(op, error);
    },

    getReleaseByTag: (tag) =>
      record({ op: "getReleaseByTag", tag }, () => {
        const release = releases.get(tag);
        return release === undefined ? err(missing(`release ${tag}`)) : ok(release);
      }),

    createRelease: ({ tag, name, body }) =>
      record({ op: "createRelease", tag, name }, () => {
        const release = newRelease(tag, name, body);
        releases.set(tag, release);
        return ok(release);
      }),

    listReleaseAssets: (release) =>
      record({ op: "listReleaseAssets", releaseId: release.id }, () => {
        const current = byId(release.id);
        return current === undefined
          ? err(missing(`release ${release.id}`))
          : ok(current.assets);
      }),

    uploadAsset: (release, { name, data }) =>
      record({ op: "uploadAsset", name, size: data.byteLength }, () => {
        const current = byId(release.id);
        if (current === undefined) {
          return err(missing(`release ${release.id}`));
        }
        if (current.assets.some((asset) => asset.name === name)) {
          return err({
            kind: "api",
            message: `asset ${name} already exists`,
            status: 422,
          });
        }
        const asset = newAsset(current.tag, name);
        releases.set(current.tag, {
          ...current,
          assets: [...current.assets, asset],
        });
        return ok(asset);
      }),

    deleteAsset: (asset) =>
      record({ op: "deleteAsset", name: asset.name }, () => {
        for (const release of releases.values()) {
          if (release.assets.some(({ id }) => id === asset.id)) {
            releases.set(release.tag, {
              ...release,
              assets: release.assets.filter(({ id }) => id !== asset.id),
            });
            return ok(undefined);
          }
        }
        return err(missing(`asset ${asset.id}`));
      }),

    updateReleaseBody: (release, body) =>
      record({ op: "updateReleaseBody", releaseId: release.id }, () => {
        const current = byId(release.id);
        if (current === undefined) {
          return err(missing(`release ${release.id}`));
        }
        const updated = { ...current, body };
        releases.set(current.tag, updated);
        return ok(updated);
      }),
  };
};
