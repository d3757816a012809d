import { HeaderList } from "~/response/headers.ts";

const encoder = new TextEncoder();

export const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
export const HTML_CONTENT_TYPE = "text/html; charset=utf-8";
export const JSON_CONTENT_TYPE = "application/json";
export const OCTET_CONTENT_TYPE = "application/octet-stream";

/**
 * Producer of a lazy, finite sequence of byte chunks. Called once when the
 * body is written.
 */
export type ChunkSource = () => AsyncIterable<Uint8Array>;

export type ReplyBody =
  | { readonly kind: "bytes"; readonly data: Uint8Array }
  | { readonly kind: "stream"; readonly source: ChunkSource }
  | null;

export interface ReplyInit {
  status?: number;
  headers?: Iterable<readonly [string, string]> | Record<string, string>;
  body?: ReplyBody;
}

/**
 * The in-flight response: filters and handlers build it, assembly turns it
 * into what the transport writes.
 *
 * @example
 * ```typescript
 * const reply = Reply.json({ id: 42 }, 201);
 * reply.headers.append("Set-Cookie", "a=1");
 * reply.headers.append("Set-Cookie", "b=2");
 * ```
 */
export class Reply {
  /** Left undefined until someone sets it; assembly defaults to 200. */
  status: number | undefined;
  readonly headers: HeaderList;
  body: ReplyBody;

  constructor(init: ReplyInit = {}) {
    this.status = init.status;
    this.headers = new HeaderList(init.headers);
    this.body = init.body ?? null;
  }

  /**
   * Copy with its own header list. The body is shared; bytes are never
   * written to and a chunk source is called once per write.
   */
  clone(): Reply {
    return new Reply({
      status: this.status,
      headers: this.headers,
      body: this.body,
    });
  }

  static text(
    text: string,
    status?: number,
    contentType = TEXT_CONTENT_TYPE,
  ): Reply {
    return new Reply({
      status,
      headers: { "Content-Type": contentType },
      body: { kind: "bytes", data: encoder.encode(text) },
    });
  }

  static html(html: string, status?: number): Reply {
    return Reply.text(html, status, HTML_CONTENT_TYPE);
  }

  static json(data: unknown, status?: number): Reply {
    return Reply.text(JSON.stringify(data) ?? "null", status, JSON_CONTENT_TYPE);
  }

  static bytes(
    data: Uint8Array | ArrayBuffer,
    contentType = OCTET_CONTENT_TYPE,
    status?: number,
  ): Reply {
    return new Reply({
      status,
      headers: { "Content-Type": contentType },
      body: {
        kind: "bytes",
        data: data instanceof Uint8Array ? data : new Uint8Array(data),
      },
    });
  }

  static stream(
    source: ChunkSource,
    contentType = OCTET_CONTENT_TYPE,
    status?: number,
  ): Reply {
    return new Reply({
      status,
      headers: { "Content-Type": contentType },
      body: { kind: "stream", source },
    });
  }

  static empty(status: number): Reply {
    return new Reply({ status });
  }

  static redirect(location: string, status = 302): Reply {
    return new Reply({ status, headers: { Location: location } });
  }
}
