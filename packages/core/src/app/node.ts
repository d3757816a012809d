/**
 * Node `http` transport: IncomingMessage in, ServerResponse out.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import type { DispatchOptions } from "~/app/types.ts";
import type { Logger } from "~/logging/types.ts";
import { type AssembledResponse, pump } from "~/response/assemble.ts";

/**
 * The part of `ServerResponse` the writer uses.
 */
export interface NodeResponseSink {
  readonly destroyed: boolean;
  writeHead(status: number, headers: string[]): unknown;
  write(chunk: Uint8Array): boolean;
  end(): unknown;
  destroy(error?: Error): unknown;
  once(event: "drain" | "close", listener: () => void): unknown;
  off(event: "drain" | "close", listener: () => void): unknown;
}

/**
 * The part of `IncomingMessage` the request builder reads. Iterating it
 * yields the body.
 */
export interface NodeRequestSource extends AsyncIterable<Uint8Array> {
  readonly method?: string;
  readonly url?: string;
  readonly rawHeaders: readonly string[];
  readonly headers: { readonly host?: string };
}

export interface Dispatcher {
  dispatch(
    request: Request,
    options?: DispatchOptions,
  ): Promise<AssembledResponse>;
}

/**
 * Build a web `Request` from a Node request. The body is streamed, never
 * buffered. An origin-form target is appended to the origin as is, so a
 * path starting with `//` stays a path.
 *
 * @throws {TypeError} When the target or the method cannot form a request.
 */
export function toWebRequest(
  req: NodeRequestSource,
  signal?: AbortSignal,
): Request {
  const method = req.method ?? "GET";
  const headers = new Headers();
  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    headers.append(req.rawHeaders[i], req.rawHeaders[i + 1]);
  }

  const host = req.headers.host ?? "localhost";
  const origin = URL.canParse(`http://${host}`)
    ? new URL(`http://${host}`).origin
    : "http://localhost";
  const target = req.url ?? "/";
  const url = target.startsWith("/")
    ? new URL(`${origin}${target}`)
    : new URL(target, origin);

  const hasBody = method !== "GET" && method !== "HEAD";
  return new Request(url, {
    method,
    headers,
    signal,
    body: hasBody ? req : null,
    duplex: "half",
  });
}

function writeChunk(
  res: NodeResponseSink,
  chunk: Uint8Array,
): Promise<void> | void {
  if (res.write(chunk)) return;
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.once("drain", done);
    res.once("close", done);
  });
}

/**
 * Write an assembled response, honouring backpressure. Once the client is
 * gone or `stillWanted` turns false, the response is destroyed instead of
 * ended.
 *
 * @returns Whether the whole body was written.
 */
export async function writeToNode(
  assembled: AssembledResponse,
  res: NodeResponseSink,
  stillWanted: () => boolean = () => true,
): Promise<boolean> {
  res.writeHead(assembled.status, assembled.headers.flat());

  const complete = await pump(
    assembled.body,
    { write: (chunk) => writeChunk(res, chunk) },
    () => !res.destroyed && stillWanted(),
  );

  if (complete) {
    res.end();
  } else {
    res.destroy();
  }
  return complete;
}

/**
 * Request listener for `http.createServer`.
 */
export function nodeListener(
  app: Dispatcher,
  log: Logger,
): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    const controller = new AbortController();
    res.once("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const stillWanted = () => !controller.signal.aborted;

    let request: Request;
    try {
      request = toWebRequest(req, controller.signal);
    } catch (error) {
      log.warn("Malformed request", {
        method: req.method,
        url: req.url,
        error,
      });
      res.writeHead(400, { "Content-Length": "0" }).end();
      return;
    }

    app.dispatch(request, { stillWanted })
      .then((assembled) => writeToNode(assembled, res, stillWanted))
      .catch((error: unknown) => {
        log.error("Failed to write response", {
          method: req.method,
          url: req.url,
          error,
        });
        res.destroy();
      });
  };
}
