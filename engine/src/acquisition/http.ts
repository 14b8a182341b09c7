/**
 * ensure-conda Engine — HTTP Client
 *
 * Minimal GET client on top of Node's http/https modules. Follows
 * redirects (the micromamba "latest" endpoint and anaconda.org download
 * URLs both redirect) and buffers the whole body: the archives we fetch
 * are a few dozen megabytes at most.
 *
 * The pipeline only talks to the HttpClient interface so tests can serve
 * canned responses without a network.
 */

import * as http from "http";
import * as https from "https";

export interface HttpResponse {
  /** Final URL after redirects */
  url: string;
  status: number;
  body: Buffer;
}

export interface HttpClient {
  /**
   * GET a URL. Resolves for every HTTP status; rejects on transport
   * failures (DNS, connection reset, timeout, too many redirects).
   */
  get(url: string): Promise<HttpResponse>;
}

const MAX_REDIRECTS = 5;
const REQUEST_TIMEOUT_MS = 60000;

export class NodeHttpClient implements HttpClient {
  constructor(
    private readonly timeoutMs: number = REQUEST_TIMEOUT_MS,
    private readonly userAgent: string = "ensure-conda",
  ) {}

  get(url: string): Promise<HttpResponse> {
    return this.request(url, 0);
  }

  private request(url: string, redirects: number): Promise<HttpResponse> {
    const parsed = new URL(url);
    const options = { headers: { "User-Agent": this.userAgent } };

    return new Promise<HttpResponse>((resolve, reject) => {
      const onResponse = (response: http.IncomingMessage): void => {
        const status = response.statusCode ?? 0;
        const location = response.headers.location;

        if (status >= 300 && status < 400 && location) {
          response.resume();
          if (redirects >= MAX_REDIRECTS) {
            reject(new Error(`Too many redirects while fetching ${url}`));
            return;
          }
          const next = new URL(location, parsed).toString();
          this.request(next, redirects + 1).then(resolve, reject);
          return;
        }

        const chunks: Buffer[] = [];
        response.on("data", (chunk: Buffer) => chunks.push(chunk));
        response.on("end", () =>
          resolve({ url, status, body: Buffer.concat(chunks) }),
        );
        response.on("error", (err) =>
          reject(new Error(`Download of ${url} failed: ${err.message}`)),
        );
      };

      const request =
        parsed.protocol === "http:"
          ? http.get(parsed, options, onResponse)
          : https.get(parsed, options, onResponse);

      request.on("error", (err) => {
        reject(new Error(`Request to ${url} failed: ${err.message}`));
      });

      request.setTimeout(this.timeoutMs, () => {
        request.destroy(
          new Error(`Request timed out after ${this.timeoutMs / 1000} seconds`),
        );
      });
    });
  }
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
