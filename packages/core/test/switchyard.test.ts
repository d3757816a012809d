import { describe, expect, it, vi } from "vitest";
import { Switchyard } from "~/app/switchyard.ts";
import {
  type NodeRequestSource,
  type NodeResponseSink,
  toWebRequest,
  writeToNode,
} from "~/app/node.ts";
import { createKey } from "~/context/type-map.ts";
import {
  ConfigError,
  ConflictingPatternError,
  RouterFrozenError,
} from "~/errors/build.ts";
import type { LogSink } from "~/logging/types.ts";
import type { AssembledResponse } from "~/response/assemble.ts";
import { Reply } from "~/response/reply.ts";

const decoder = new TextDecoder();

function request(path: string, init?: RequestInit): Request {
  return new Request(`http://localhost${path}`, init);
}

function header(res: AssembledResponse, name: string): string | undefined {
  const lower = name.toLowerCase();
  return res.headers.find(([key]) => key.toLowerCase() === lower)?.[1];
}

async function bodyText(res: AssembledResponse): Promise<string> {
  if (res.body === null) return "";
  if (res.body instanceof Uint8Array) return decoder.decode(res.body);
  let text = "";
  for await (const chunk of res.body()) {
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

async function bodyJson(res: AssembledResponse): Promise<unknown> {
  return JSON.parse(await bodyText(res));
}

function usersApp(): Switchyard {
  const app = new Switchyard();
  app.get("/users/:id", (ctx) => ({ id: ctx.params.id }));
  app.delete("/users/:id", () => undefined);
  app.get("/files/*path", (ctx) => ctx.text(ctx.params.path));
  return app;
}

describe("Switchyard", () => {
  describe("dispatch()", () => {
    it("should bind variables and serialize objects as JSON", async () => {
      const res = await usersApp().dispatch(request("/users/42"));

      expect(res.status).toBe(200);
      expect(header(res, "Content-Type")).toBe("application/json");
      expect(header(res, "Server")).toBe("switchyard");
      expect(header(res, "Content-Length")).toBe("11");
      expect(await bodyJson(res)).toEqual({ id: "42" });
    });

    it("should answer 204 with no body for empty results", async () => {
      const res = await usersApp().dispatch(
        request("/users/42", { method: "DELETE" }),
      );

      expect(res.status).toBe(204);
      expect(res.body).toBeNull();
      expect(header(res, "Content-Length")).toBeUndefined();
    });

    it("should bind the wildcard remainder", async () => {
      const res = await usersApp().dispatch(request("/files/a/b/c.txt"));

      expect(res.status).toBe(200);
      expect(await bodyText(res)).toBe("a/b/c.txt");
    });

    it("should answer 405 with the allowed methods", async () => {
      const res = await usersApp().dispatch(
        request("/users/42", { method: "PUT" }),
      );

      expect(res.status).toBe(405);
      expect(header(res, "Allow")).toBe("GET, DELETE");
      expect(await bodyJson(res)).toEqual({
        error: {
          message: "Method Not Allowed",
          code: "METHOD_NOT_ALLOWED",
          status: 405,
        },
      });
    });

    it("should answer 404 for unknown paths", async () => {
      const res = await usersApp().dispatch(request("/unknown"));

      expect(res.status).toBe(404);
      expect(await bodyJson(res)).toEqual({
        error: { message: "Not Found", code: "NOT_FOUND", status: 404 },
      });
    });

    it("should answer HEAD from the GET handler without a body", async () => {
      const res = await usersApp().dispatch(
        request("/users/42", { method: "HEAD" }),
      );

      expect(res.status).toBe(200);
      expect(header(res, "Content-Length")).toBe("11");
      expect(res.body).toBeNull();
    });

    it("should decode percent-escapes but keep encoded slashes", async () => {
      const app = new Switchyard();
      app.get("/tags/:name", (ctx) => ctx.params.name);

      const spaced = await app.dispatch(request("/tags/hello%20world"));
      const slashed = await app.dispatch(request("/tags/a%2Fb"));

      expect(await bodyText(spaced)).toBe("hello world");
      expect(await bodyText(slashed)).toBe("a%2Fb");
    });

    it("should ignore the query when matching", async () => {
      const app = new Switchyard();
      app.get("/search", (ctx) => ctx.query.get("q"));

      const res = await app.dispatch(request("/search?q=rails"));

      expect(await bodyText(res)).toBe("rails");
    });

    it("should apply the configured prefix", async () => {
      const app = new Switchyard({ prefix: "/api" });
      app.get("/ping", () => "pong");

      expect((await app.dispatch(request("/api/ping"))).status).toBe(200);
      expect((await app.dispatch(request("/ping"))).status).toBe(404);
    });
  });

  describe("content negotiation", () => {
    function docsApp(): Switchyard {
      const app = new Switchyard();
      app.get("/doc", (ctx) => ctx.json({ title: "doc" }), "application/json");
      app.get("/doc", (ctx) => ctx.html("<h1>doc</h1>"), "text/html");
      return app;
    }

    it("should pick the handler for the preferred type", async () => {
      const res = await docsApp().dispatch(
        request("/doc", { headers: { Accept: "text/html, application/json;q=0.5" } }),
      );

      expect(header(res, "Content-Type")).toBe("text/html; charset=utf-8");
      expect(await bodyText(res)).toBe("<h1>doc</h1>");
    });

    it("should use the first registered type without an Accept header", async () => {
      const res = await docsApp().dispatch(request("/doc"));

      expect(await bodyJson(res)).toEqual({ title: "doc" });
    });

    it("should expose the negotiated type on the context", async () => {
      const app = new Switchyard();
      app.get("/doc", (ctx) => ctx.contentType ?? "none", "text/csv");

      const res = await app.dispatch(request("/doc", { headers: { Accept: "*/*" } }));

      expect(await bodyText(res)).toBe("text/csv");
    });

    it("should answer 406 when nothing is acceptable", async () => {
      const res = await docsApp().dispatch(
        request("/doc", { headers: { Accept: "image/png" } }),
      );

      expect(res.status).toBe(406);
      expect(await bodyJson(res)).toEqual({
        error: {
          message: "Not Acceptable",
          code: "NOT_ACCEPTABLE",
          status: 406,
        },
      });
    });

    it("should fall back to the untyped handler", async () => {
      const app = docsApp();
      app.get("/doc", () => "plain");

      const res = await app.dispatch(
        request("/doc", { headers: { Accept: "image/png" } }),
      );

      expect(res.status).toBe(200);
      expect(await bodyText(res)).toBe("plain");
    });
  });

  describe("custom fallbacks", () => {
    it("should use the not-found handler", async () => {
      const app = new Switchyard();
      app.onNotFound((ctx) => ctx.text(`no ${ctx.path}`, 404));

      const res = await app.dispatch(request("/missing"));

      expect(res.status).toBe(404);
      expect(await bodyText(res)).toBe("no /missing");
    });

    it("should keep 405 and Allow for custom replies", async () => {
      const app = new Switchyard();
      app.post("/items", () => "created");
      app.onMethodNotAllowed((_ctx, allowed) => `use ${allowed.join("|")}`);

      const res = await app.dispatch(request("/items"));

      expect(res.status).toBe(405);
      expect(header(res, "Allow")).toBe("POST");
      expect(await bodyText(res)).toBe("use POST");
    });

    it("should pass the available types to the not-acceptable handler", async () => {
      const app = new Switchyard();
      app.get("/doc", () => "{}", "application/json");
      app.onNotAcceptable((ctx, available) =>
        ctx.error(406, `try ${available.join(", ")}`, "NOT_ACCEPTABLE")
      );

      const res = await app.dispatch(
        request("/doc", { headers: { Accept: "text/html" } }),
      );

      expect(res.status).toBe(406);
      expect(await bodyJson(res)).toEqual({
        error: {
          message: "try application/json",
          code: "NOT_ACCEPTABLE",
          status: 406,
        },
      });
    });
  });

  describe("filters and groups", () => {
    it("should run filters in order around the handler", async () => {
      const calls: string[] = [];
      const app = new Switchyard();

      app.use({
        before: () => {
          calls.push("global before");
        },
        after: () => {
          calls.push("global after");
        },
      });
      app.group("/api", (api) => {
        api.use({
          before: () => {
            calls.push("group before");
          },
          after: () => {
            calls.push("group after");
          },
        });
        api.get("/items", () => {
          calls.push("handler");
          return "ok";
        }, {
          before: [() => {
            calls.push("route before");
          }],
          after: [() => {
            calls.push("route after");
          }],
        });
      });

      const res = await app.dispatch(request("/api/items"));

      expect(res.status).toBe(200);
      expect(calls).toEqual([
        "global before",
        "group before",
        "route before",
        "handler",
        "route after",
        "group after",
        "global after",
      ]);
    });

    it("should nest group prefixes", async () => {
      const app = new Switchyard();
      app.group("/api", (api) => {
        api.group("/v1", (v1) => v1.get("/ping", () => "pong"));
      });

      const res = await app.dispatch(request("/api/v1/ping"));

      expect(await bodyText(res)).toBe("pong");
    });

    it("should let a before-filter answer instead of the handler", async () => {
      const handler = vi.fn(() => "secret");
      const app = new Switchyard();
      app.before((ctx) =>
        ctx.headers.get("authorization") === "Bearer test-secret"
          ? undefined
          : ctx.error(401, "Unauthorized", "UNAUTHORIZED")
      );
      app.after((_ctx, reply) => {
        reply.headers.set("X-Checked", "yes");
      });
      app.get("/private", handler);

      const denied = await app.dispatch(request("/private"));
      const allowed = await app.dispatch(
        request("/private", { headers: { Authorization: "Bearer test-secret" } }),
      );

      expect(denied.status).toBe(401);
      expect(header(denied, "X-Checked")).toBe("yes");
      expect(allowed.status).toBe(200);
      expect(await bodyText(allowed)).toBe("secret");
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it("should run global filters for synthesized replies", async () => {
      const app = new Switchyard();
      app.after((_ctx, reply) => {
        reply.headers.set("X-Request-Id", "req-1");
      });

      const res = await app.dispatch(request("/nowhere"));

      expect(res.status).toBe(404);
      expect(header(res, "X-Request-Id")).toBe("req-1");
    });

    it("should keep headers set by before-filters", async () => {
      const app = new Switchyard();
      app.before((_ctx, reply) => {
        reply.headers.set("X-Trace", "t-1");
      });
      app.get("/", () => Reply.json({ ok: true }, 201));

      const res = await app.dispatch(request("/"));

      expect(res.status).toBe(201);
      expect(header(res, "X-Trace")).toBe("t-1");
    });
  });

  describe("shared replies", () => {
    it("should keep per-request headers off a cached reply", async () => {
      const cached = Reply.text("ok");
      const app = new Switchyard();
      app.before((ctx, reply) => {
        reply.headers.set("X-Request-Path", ctx.path);
      });
      app.get("/:name", () => cached);

      const alice = await app.dispatch(request("/alice"));
      const bob = await app.dispatch(request("/bob"));

      expect(header(alice, "X-Request-Path")).toBe("/alice");
      expect(header(bob, "X-Request-Path")).toBe("/bob");
      expect(bob.headers.filter(([name]) => name === "X-Request-Path"))
        .toHaveLength(1);
      expect(cached.headers.has("X-Request-Path")).toBe(false);
    });
  });

  describe("shared data", () => {
    it("should expose globals to every request", async () => {
      const Greeting = createKey<string>("greeting");
      const app = new Switchyard();
      app.global(Greeting, "hello");
      app.get("/", (ctx) => ctx.global.get(Greeting) ?? "missing");

      const res = await app.dispatch(request("/"));

      expect(await bodyText(res)).toBe("hello");
    });

    it("should accept class constructors as keys", async () => {
      class Counter {
        count = 0;
      }
      const app = new Switchyard();
      app.global(Counter, new Counter());
      app.get("/", (ctx) => {
        const counter = ctx.global.get(Counter);
        if (counter) counter.count++;
        return String(counter?.count);
      });

      await app.dispatch(request("/"));
      const res = await app.dispatch(request("/"));

      expect(await bodyText(res)).toBe("2");
    });

    it("should give each request its own store", async () => {
      const Seen = createKey<string>("seen");
      const app = new Switchyard();
      app.before((ctx) => {
        ctx.store.set(Seen, ctx.path);
      });
      app.get("/*rest", (ctx) => ctx.store.get(Seen) ?? "none");

      const [a, b] = await Promise.all([
        app.dispatch(request("/a")),
        app.dispatch(request("/b")),
      ]);

      expect(await bodyText(a)).toBe("/a");
      expect(await bodyText(b)).toBe("/b");
    });
  });

  describe("errors", () => {
    function capture(): LogSink & { err: string[] } {
      const err: string[] = [];
      return { err, stdout: () => undefined, stderr: (line) => err.push(line) };
    }

    it("should turn a thrown error into a 500 and log it", async () => {
      const sink = capture();
      const hook = vi.fn();
      const app = new Switchyard({ log: { json: true }, logSink: sink });
      app.onError(hook);
      app.get("/boom", () => {
        throw new Error("kaboom");
      });

      const res = await app.dispatch(request("/boom"));

      expect(res.status).toBe(500);
      expect(await bodyJson(res)).toEqual({
        error: {
          message: "Internal Server Error",
          code: "HANDLER_FAILURE",
          status: 500,
        },
      });
      expect(hook).toHaveBeenCalledTimes(1);
      expect(sink.err).toHaveLength(1);
      expect(JSON.parse(sink.err[0])).toMatchObject({
        level: "error",
        msg: "GET /boom failed",
        name: "switchyard:request",
        code: "HANDLER_FAILURE",
        error: { name: "Error", message: "kaboom" },
      });
    });

    it("should answer 500 when the error transformer throws", async () => {
      const app = new Switchyard({
        log: { level: "silent" },
        transformError: () => {
          throw new Error("bad transformer");
        },
      });
      app.get("/boom", () => {
        throw new Error("kaboom");
      });

      const res = await app.dispatch(request("/boom"));

      expect(res.status).toBe(500);
      expect(await bodyJson(res)).toEqual({
        error: {
          message: "Internal Server Error",
          code: "HANDLER_FAILURE",
          status: 500,
        },
      });
    });

    it("should reject invalid options", () => {
      expect(() => new Switchyard({ prefix: "api" })).toThrow(ConfigError);
    });

    it("should reject conflicting variable names", () => {
      const app = new Switchyard({ log: { level: "silent" } });
      app.get("/users/:id", () => "id");

      expect(() => app.get("/users/:name/posts", () => "name")).toThrow(
        ConflictingPatternError,
      );
    });

    it("should refuse registrations after the first dispatch", async () => {
      const app = usersApp();
      await app.dispatch(request("/users/1"));

      expect(app.frozen).toBe(true);
      expect(() => app.get("/late", () => "late")).toThrow(RouterFrozenError);
      expect(() => app.use({})).toThrow(RouterFrozenError);
      expect(() => app.global(createKey<number>("n"), 1)).toThrow(
        RouterFrozenError,
      );
    });
  });

  describe("fetch()", () => {
    it("should answer web requests", async () => {
      const res = await usersApp().fetch(request("/users/7"));

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("application/json");
      expect(await res.json()).toEqual({ id: "7" });
    });

    it("should stream async iterable results", async () => {
      const app = new Switchyard();
      app.get("/count", async function* () {
        yield "1,";
        yield "2,";
        yield "3";
      });

      const res = await app.fetch(request("/count"));

      expect(await res.text()).toBe("1,2,3");
    });
  });
});

describe("writeToNode()", () => {
  class FakeResponse implements NodeResponseSink {
    destroyed = false;
    ended = false;
    head: [number, string[]] | undefined;
    readonly chunks: string[] = [];

    writeHead(status: number, headers: string[]): void {
      this.head = [status, headers];
    }

    write(chunk: Uint8Array): boolean {
      this.chunks.push(decoder.decode(chunk));
      return true;
    }

    end(): void {
      this.ended = true;
    }

    destroy(): void {
      this.destroyed = true;
    }

    once(): void {}

    off(): void {}
  }

  it("should write the head, the body and end", async () => {
    const app = new Switchyard();
    app.get("/", () => "hello");
    const res = new FakeResponse();

    const complete = await writeToNode(await app.dispatch(request("/")), res);

    expect(complete).toBe(true);
    expect(res.head).toEqual([200, [
      "Content-Type",
      "text/plain; charset=utf-8",
      "Server",
      "switchyard",
      "Content-Length",
      "5",
    ]]);
    expect(res.chunks).toEqual(["hello"]);
    expect(res.ended).toBe(true);
  });

  it("should stop streaming once the client is gone", async () => {
    const app = new Switchyard();
    let wanted = true;
    app.get("/stream", () =>
      Reply.stream(async function* () {
        yield new TextEncoder().encode("a");
        wanted = false;
        yield new TextEncoder().encode("b");
      })
    );
    const res = new FakeResponse();

    const complete = await writeToNode(
      await app.dispatch(request("/stream")),
      res,
      () => wanted,
    );

    expect(complete).toBe(false);
    expect(res.chunks).toEqual(["a"]);
    expect(res.destroyed).toBe(true);
    expect(res.ended).toBe(false);
  });
});

describe("toWebRequest()", () => {
  function nodeRequest(
    url: string,
    options: { method?: string; host?: string; body?: string[] } = {},
  ): NodeRequestSource {
    const host = options.host ?? "example.test";
    const chunks = options.body ?? [];
    return {
      method: options.method ?? "GET",
      url,
      rawHeaders: ["Host", host, "X-Trace", "t-1"],
      headers: { host },
      async *[Symbol.asyncIterator]() {
        for (const chunk of chunks) {
          yield new TextEncoder().encode(chunk);
        }
      },
    };
  }

  it("should keep a target starting with // as the path", () => {
    const req = toWebRequest(nodeRequest("//files/a?x=1"));
    const url = new URL(req.url);

    expect(url.host).toBe("example.test");
    expect(url.pathname).toBe("//files/a");
    expect(url.search).toBe("?x=1");
  });

  it("should copy the method and headers", () => {
    const req = toWebRequest(nodeRequest("/items", { method: "DELETE" }));

    expect(req.method).toBe("DELETE");
    expect(req.headers.get("x-trace")).toBe("t-1");
  });

  it("should take only the origin from the Host header", () => {
    const req = toWebRequest(nodeRequest("/files", { host: "evil.test/x" }));

    expect(req.url).toBe("http://evil.test/files");
  });

  it("should fall back to localhost for an unusable Host", () => {
    const req = toWebRequest(nodeRequest("/files", { host: "bad host" }));

    expect(req.url).toBe("http://localhost/files");
  });

  it("should accept absolute-form targets", () => {
    const req = toWebRequest(nodeRequest("http://other.test/a/b"));

    expect(req.url).toBe("http://other.test/a/b");
  });

  it("should stream the body of requests that have one", async () => {
    const req = toWebRequest(
      nodeRequest("/upload", { method: "POST", body: ["he", "llo"] }),
    );

    expect(await req.text()).toBe("hello");
  });
});

