//! Remote platform descriptors: the ruby versions and OS environments a
//! tebako release supports, one JSON document per descriptor source.

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { FetchError, ParseError } from "./errors.js";
import type { DescriptorSource, EnvironmentRecord } from "./platforms.js";

export type RubySet = "full" | "tidy";

export type PlatformDescriptor = {
  ruby: string[];
  env: EnvironmentRecord[];
};

export const DEFAULT_DESCRIPTOR_BASE_URL =
  "https://raw.githubusercontent.com/tamatebako/tebako";

const environmentRecordSchema = z
  .object({
    os: z.string(),
    ALPINE_VER: z
      .union([z.string(), z.number()])
      .transform((value) => String(value))
      .optional(),
  })
  .passthrough();

const descriptorSectionSchema = z.object({
  ruby: z.array(z.string()),
  env: z.array(environmentRecordSchema),
});

export const descriptorUrl = (
  baseUrl: string,
  version: string,
  source: DescriptorSource,
) =>
  `${baseUrl.replace(/\/+$/, "")}/v${version}/.github/matrices/${source}.json`;

export type FetchDescriptorParams = {
  baseUrl: string;
  version: string;
  source: DescriptorSource;
  rubySet: RubySet;
};

/// Downloads one descriptor and returns its selected ruby set section.
export const fetchDescriptor = async (
  http: AxiosInstance,
  { baseUrl, version, source, rubySet }: FetchDescriptorParams,
): Promise<PlatformDescriptor> => {
  const url = descriptorUrl(baseUrl, version, source);

  const response = await http
    .get<string>(url, {
      responseType: "text",
      // Keep the raw body, JSON parsing is done below.
      transformResponse: (data: unknown) => data,
      validateStatus: () => true,
    })
    .catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Failed to fetch matrix file ${url}: ${reason}`, url);
    });

  if (response.status < 200 || response.status >= 300) {
    throw new FetchError(
      `HTTP request for ${url} failed: ${response.status}`,
      url,
      response.status,
    );
  }

  let body: unknown;
  try {
    body = JSON.parse(response.data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Invalid JSON response from ${url}: ${reason}`, url);
  }

  const document = z.record(z.string(), z.unknown()).safeParse(body);
  if (!document.success || !(rubySet in document.data)) {
    throw new ParseError(`No ${rubySet} section in ${url}`, url);
  }

  const section = descriptorSectionSchema.safeParse(document.data[rubySet]);
  if (!section.success) {
    throw new ParseError(
      `Unexpected ${rubySet} section layout in ${url}: ${section.error.message}`,
      url,
    );
  }
  return section.data;
};

export const defaultHttp = (): AxiosInstance =>
  axios.create({ timeout: 30_000 });
