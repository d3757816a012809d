/**
 * Run with: npm run example
 */

import { Type } from "@sinclair/typebox";
import {
  cors,
  createKey,
  requestLogger,
  Switchyard,
  validateQuery,
} from "../packages/core/src/mod.ts";

interface Paging {
  page: number;
  size?: number;
}

const PagingKey = createKey<Paging>("paging");
const PagingSchema = Type.Object({
  page: Type.Integer({ minimum: 1 }),
  size: Type.Optional(Type.Integer({ minimum: 1, maximum: 100 })),
});

class UserStore {
  private readonly users = new Map<string, { id: string; name: string }>([
    ["1", { id: "1", name: "Ada" }],
    ["2", { id: "2", name: "Grace" }],
  ]);

  list(): { id: string; name: string }[] {
    return [...this.users.values()];
  }

  find(id: string): { id: string; name: string } | undefined {
    return this.users.get(id);
  }

  remove(id: string): boolean {
    return this.users.delete(id);
  }
}

const app = new Switchyard({ development: true, log: { level: "debug" } });

app.use(requestLogger());
app.use(cors());
app.global(UserStore, new UserStore());

app.get("/", () => "switchyard");

app.group("/users", (users) => {
  users.get("/", (ctx) => {
    const paging = ctx.store.get(PagingKey);
    const all = ctx.global.get(UserStore)?.list() ?? [];
    return { paging, users: all };
  }, { before: [validateQuery(PagingKey, PagingSchema)] });

  users.get("/:id", (ctx) => {
    const user = ctx.global.get(UserStore)?.find(ctx.params.id);
    return user ?? ctx.error(404, "User not found", "USER_NOT_FOUND");
  }, "application/json");

  users.get(
    "/:id",
    (ctx) => {
      const user = ctx.global.get(UserStore)?.find(ctx.params.id);
      return ctx.html(user ? `<h1>${user.name}</h1>` : "<h1>Unknown</h1>");
    },
    "text/html",
  );

  users.delete("/:id", (ctx) => {
    ctx.global.get(UserStore)?.remove(ctx.params.id);
    return ctx.noContent();
  });
});

app.get("/files/*path", (ctx) => ctx.text(`file: ${ctx.params.path}`));

await app.listen({ port: 8000 });
