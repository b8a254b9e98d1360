import { Agent as HttpAgent, request as httpRequest, type IncomingMessage } from "node:http";
import { Agent as HttpsAgent, request as httpsRequest } from "node:https";
import { URL } from "node:url";

export interface HttpRequestOptions {
  readonly headers?: Record<string, string | number | undefined>;
  readonly timeoutMs?: number;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly body: string;
  readonly headers: Record<string, string | string[] | undefined>;
}

export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
  /** Releases pooled sockets. The client must not be used afterwards. */
  close?(): void;
}

export interface HttpClientOptions {
  /** Reuse sockets across requests to the same host. Defaults to true. */
  readonly keepAlive?: boolean;
  readonly maxSockets?: number;
}

export class HttpTimeoutError extends Error {
  public constructor(public readonly timeoutMs: number) {
    super(`request timed out after ${timeoutMs}ms`);
    this.name = "HttpTimeoutError";
  }
}

/**
 * Small HTTP client over node:http(s) whose agents live as long as the client,
 * so one instance acts as a connection-reusing session.
 */
export const createHttpClient = (options: HttpClientOptions = {}): HttpClient => {
  const keepAlive = options.keepAlive ?? true;
  const maxSockets = options.maxSockets ?? 4;
  const httpAgent = new HttpAgent({ keepAlive, maxSockets });
  const httpsAgent = new HttpsAgent({ keepAlive, maxSockets });

  return {
    get: (url, requestOptions = {}) => {
      const target = new URL(url);
      const base = {
        method: "GET",
        hostname: target.hostname,
        path: `${target.pathname}${target.search}`,
        port: target.port || undefined,
        headers: requestOptions.headers,
      };

      return new Promise<HttpResponse>((resolve, reject) => {
        const onResponse = (res: IncomingMessage): void => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => {
            chunks.push(chunk);
          });
          res.on("error", (error) => reject(error));
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
            ? httpRequest({ ...base, agent: httpAgent }, onResponse)
            : httpsRequest({ ...base, agent: httpsAgent }, onResponse);

        req.on("error", (error) => reject(error));

        const { timeoutMs } = requestOptions;
        if (timeoutMs) {
          req.setTimeout(timeoutMs, () => {
            req.destroy(new HttpTimeoutError(timeoutMs));
          });
        }

        req.end();
      });
    },
    close: () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
};
