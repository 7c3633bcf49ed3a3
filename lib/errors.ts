//! Error taxonomy shared by the matrix builder and the release reconciler.

import type { ApiErrorKind } from "./releaseApi.js";

export type CiErrorKind =
  | "config"
  | "fetch"
  | "parse"
  | "patternExtraction"
  | "remoteApi";

export abstract class CiError extends Error {
  abstract readonly kind: CiErrorKind;
}

/// A required input is missing or invalid.
export class ConfigError extends CiError {
  override readonly kind = "config";
  override readonly name = "ConfigError";
}

/// A remote document could not be retrieved.
export class FetchError extends CiError {
  override readonly kind = "fetch";
  override readonly name = "FetchError";

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

/// A remote document was retrieved but does not have the expected shape.
export class ParseError extends CiError {
  override readonly kind = "parse";
  override readonly name = "ParseError";

  constructor(
    message: string,
    readonly url: string,
  ) {
    super(message);
  }
}

/// An environment record does not carry the version its family needs.
export class PatternExtractionError extends CiError {
  override readonly kind = "patternExtraction";
  override readonly name = "PatternExtractionError";
}

/// A release API call failed.
export class RemoteApiError extends CiError {
  override readonly kind = "remoteApi";
  override readonly name = "RemoteApiError";

  constructor(
    message: string,
    readonly apiErrorKind: ApiErrorKind,
    readonly status?: number,
  ) {
    super(message);
  }
}
