import { request as httpRequest, type IncomingHttpHeaders, type IncomingMessage } from "node:http";
import { request as httpsRequest } from "node:https";

export interface HttpRequestOptions {
  readonly headers?: Record<string, string | number | undefined>;
  readonly timeoutMs?: number;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly body: string;
  readonly headers: IncomingHttpHeaders;
}

/**
 * The one network seam of the data layer. Sources take it as an option so
 * tests can answer requests in memory.
 */
export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

const DEFAULT_HEADERS = {
  Accept: "application/json",
  "User-Agent": "kline-lab",
};

export const createHttpClient = (): HttpClient => {
  return {
    get: (url, options = {}) => {
      const target = new URL(url);
      const requestOptions = {
        method: "GET",
        headers: { ...DEFAULT_HEADERS, ...options.headers },
      };

      return new Promise<HttpResponse>((resolve, reject) => {
        const onResponse = (res: IncomingMessage): void => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => {
            chunks.push(chunk);
          });
          res.on("error", reject);
          res.on("end", () => {
            resolve({
              statusCode: res.statusCode ?? 0,
              body: Buffer.concat(chunks).toString("utf-8"),
              headers: res.headers,
            });
          });
        };

        const req =
          target.protocol === "http:"
            ? httpRequest(target, requestOptions, onResponse)
            : httpsRequest(target, requestOptions, onResponse);

        req.on("error", (error) => {
          reject(new Error(`GET ${target.origin}${target.pathname} failed: ${error.message}`));
        });

        if (options.timeoutMs) {
          req.setTimeout(options.timeoutMs, () => {
            req.destroy(new Error(`request timed out after ${options.timeoutMs}ms`));
          });
        }

        req.end();
      });
    },
  };
};
