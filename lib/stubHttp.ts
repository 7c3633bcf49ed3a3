import axios, {
  AxiosError,
  type AxiosInstance,
  type InternalAxiosRequestConfig,
} from "axios";

export type StubResponse = {
  status: number;
  body: string;
};

/// An axios instance answering from a table of URLs instead of the network.
/// Unknown URLs answer 404; a `null` entry fails like a dropped connection.
export const stubHttp = (
  routes: Record<string, StubResponse | null>,
): AxiosInstance & { requested: string[] } => {
  const requested: string[] = [];
  const adapter = async (config: InternalAxiosRequestConfig) => {
    const url = config.url ?? "";
    requested.push(url);
    const route = routes[url];
    if (route === null) {
      throw new AxiosError("socket hang up", "ECONNRESET", config);
    }
    const { status, body } = route ?? { status: 404, body: "404: Not Found" };
    return {
      data: body,
      status,
      statusText: String(status),
      headers: {},
      config,
    };
  };
  return Object.assign(axios.create({ adapter }), { requested });
};

export const json = (value: unknown): StubResponse => ({
  status: 200,
  body: JSON.stringify(value),
});
