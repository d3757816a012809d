import type { ChunkSource, Reply } from "~/response/reply.ts";

/**
 * What the transport writes: status, ordered headers and either a
 * materialized body or a chunk producer.
 */
export interface AssembledResponse {
  status: number;
  headers: Array<[string, string]>;
  body: Uint8Array | ChunkSource | null;
}

export interface AssembleOptions {
  /** Request method; `HEAD` drops the body but keeps the headers. */
  method: string;
  /** `Server` header added when the reply has none. */
  serverName?: string;
  /** `Content-Type` added to replies with a body and no content type. */
  defaultContentType?: string;
}

function forbidsBody(status: number): boolean {
  return status < 200 || status === 204 || status === 304;
}

/**
 * Turn a reply into a status/headers/body triple.
 *
 * The status defaults to 200. `Content-Length` is computed for
 * materialized bodies, so a `HEAD` reply carries the same headers the
 * matching `GET` would.
 */
export function assemble(
  reply: Reply,
  options: AssembleOptions,
): AssembledResponse {
  const status = reply.status ?? 200;
  const headers = reply.headers.clone();
  let body: Uint8Array | ChunkSource | null = null;

  if (options.serverName && !headers.has("Server")) {
    headers.set("Server", options.serverName);
  }

  if (forbidsBody(status)) {
    headers.delete("Content-Length");
    headers.delete("Content-Type");
  } else if (reply.body === null) {
    headers.set("Content-Length", "0");
  } else {
    if (options.defaultContentType && !headers.has("Content-Type")) {
      headers.set("Content-Type", options.defaultContentType);
    }
    if (reply.body.kind === "bytes") {
      headers.set("Content-Length", String(reply.body.data.byteLength));
      body = reply.body.data;
    } else {
      body = reply.body.source;
    }
  }

  return {
    status,
    headers: headers.toArray(),
    body: options.method === "HEAD" ? null : body,
  };
}

export interface ChunkSink {
  write(chunk: Uint8Array): void | Promise<void>;
}

/**
 * Write a body to a sink. The `stillWanted` flag is checked before the
 * first chunk and between chunks; once it turns false no further chunk is
 * written and the producer is closed.
 *
 * @returns Whether the whole body was written.
 */
export async function pump(
  body: Uint8Array | ChunkSource | null,
  sink: ChunkSink,
  stillWanted: () => boolean = () => true,
): Promise<boolean> {
  if (body === null) return true;
  if (!stillWanted()) return false;

  if (body instanceof Uint8Array) {
    await sink.write(body);
    return true;
  }

  for await (const chunk of body()) {
    if (!stillWanted()) return false;
    await sink.write(chunk);
  }

  return true;
}

function toReadableStream(source: ChunkSource): ReadableStream<Uint8Array> {
  const iterator = source()[Symbol.asyncIterator]();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const next = await iterator.next();
      if (next.done) {
        controller.close();
      } else {
        controller.enqueue(next.value);
      }
    },
    async cancel() {
      await iterator.return?.();
    },
  });
}

/**
 * Build a web `Response` from an assembled response.
 */
export function toWebResponse(assembled: AssembledResponse): Response {
  const { status, headers, body } = assembled;
  if (body === null) {
    return new Response(null, { status, headers });
  }
  return new Response(
    body instanceof Uint8Array ? body : toReadableStream(body),
    { status, headers },
  );
}
