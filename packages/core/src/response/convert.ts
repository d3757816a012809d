import {
  type ChunkSource,
  OCTET_CONTENT_TYPE,
  Reply,
} from "~/response/reply.ts";

const encoder = new TextEncoder();

/**
 * Normalize one streamed chunk to bytes.
 */
export function toChunk(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (typeof value === "string") return encoder.encode(value);
  if (value instanceof ArrayBuffer) return new Uint8Array(value);
  throw new TypeError(`Unsupported body chunk: ${typeof value}`);
}

function isAsyncIterable(value: object): value is AsyncIterable<unknown> {
  return Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === "function";
}

/**
 * Adapt a web `ReadableStream` to a chunk source. Stopping early cancels
 * the stream.
 */
export function fromReadableStream(stream: ReadableStream<unknown>): ChunkSource {
  return async function* () {
    const reader = stream.getReader();
    let done = false;
    try {
      while (true) {
        const next = await reader.read();
        if (next.done) {
          done = true;
          return;
        }
        yield toChunk(next.value);
      }
    } finally {
      if (!done) await reader.cancel();
      reader.releaseLock();
    }
  };
}

function fromAsyncIterable(iterable: AsyncIterable<unknown>): ChunkSource {
  return async function* () {
    for await (const chunk of iterable) {
      yield toChunk(chunk);
    }
  };
}

/**
 * Convert a web `Response` into a reply. The body stays a stream.
 */
export function fromWebResponse(response: Response): Reply {
  const reply = new Reply({ status: response.status });
  response.headers.forEach((value, name) => {
    reply.headers.append(name, value);
  });
  if (response.body) {
    reply.body = { kind: "stream", source: fromReadableStream(response.body) };
  }
  return reply;
}

/**
 * Convert whatever a handler returned into a reply.
 *
 * - `Reply`: as is
 * - web `Response`: converted, body streamed
 * - `null` / `undefined`: 204
 * - string: `text/plain`
 * - `Uint8Array` / `ArrayBuffer`: `application/octet-stream`
 * - `ReadableStream` / async iterable: streamed `application/octet-stream`
 * - anything else: JSON
 */
export function toReply(result: unknown): Reply {
  if (result instanceof Reply) {
    return result;
  }

  if (result == null) {
    return Reply.empty(204);
  }

  if (typeof result === "string") {
    return Reply.text(result);
  }

  if (typeof result === "object") {
    if (result instanceof Response) {
      return fromWebResponse(result);
    }
    if (result instanceof Uint8Array || result instanceof ArrayBuffer) {
      return Reply.bytes(result);
    }
    if (result instanceof ReadableStream) {
      return Reply.stream(fromReadableStream(result), OCTET_CONTENT_TYPE);
    }
    if (isAsyncIterable(result)) {
      return Reply.stream(fromAsyncIterable(result), OCTET_CONTENT_TYPE);
    }
  }

  return Reply.json(result);
}

/**
 * Like {@link toReply}, but a `Reply` is copied so the caller may change
 * it. Replies handed back by application code can be shared between
 * requests.
 */
export function toOwnedReply(result: unknown): Reply {
  return result instanceof Reply ? result.clone() : toReply(result);
}
