import { ApolloServer, HeaderMap } from "@apollo/server";
import { serve } from "@hono/node-server";
import { Context, Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { Server } from "node:net";
import { ChatMessage, ChatReplyOptions, handleChatCommand } from "../chat/commands";
import { IHealthProvider } from "../interfaces/IHealthProvider";
import { errorMessage } from "../shared/errors";
import { createLogger } from "../shared/logger";
import { HealthStatus } from "../types/health.types";
import { ApiContext, FaucetApi } from "./context";
import { buildResolvers } from "./resolvers";
import { typeDefs } from "./schema";

export type { ApiContext } from "./context";

const logger = createLogger("http");

const GATEWAY_KEY_HEADER = "x-gateway-key";

export function createApolloServer(): ApolloServer<ApiContext> {
  return new ApolloServer<ApiContext>({ typeDefs, resolvers: buildResolvers() });
}

export interface HttpAppDeps {
  health: IHealthProvider;
  /** Null while the faucet could not be built; its routes then answer 503. */
  faucet: { apollo: ApolloServer<ApiContext>; api: FaucetApi; chat: ChatReplyOptions } | null;
  /** Shared secret a chat gateway sends in `x-gateway-key`. */
  gatewayKey: string | null;
}

export function healthcheckResponse(health: HealthStatus): {
  statusCode: 200 | 503;
  body: { status: "ok" | "unhealthy" } & HealthStatus;
} {
  return {
    statusCode: health.healthy ? 200 : 503,
    body: { status: health.healthy ? "ok" : "unhealthy", ...health }
  };
}

function isGateway(c: Context, gatewayKey: string | null): boolean {
  return gatewayKey !== null && c.req.header(GATEWAY_KEY_HEADER) === gatewayKey;
}

function gatewayAuth(c: Context, gatewayKey: string | null): Response | null {
  if (gatewayKey === null) {
    return c.json({ error: "gateway-key-not-configured" }, 501);
  }
  if (!isGateway(c, gatewayKey)) {
    return c.json({ error: "invalid-gateway-key" }, 401);
  }
  return null;
}

function parseChatMessage(body: unknown): ChatMessage | null {
  if (typeof body !== "object" || body === null) {
    return null;
  }
  const requesterId = "requesterId" in body ? body.requesterId : undefined;
  const content = "content" in body ? body.content : undefined;
  if (typeof requesterId !== "string" || requesterId.trim() === "" || typeof content !== "string") {
    return null;
  }
  return { requesterId, content };
}

/**
 * `GET /healthcheck`, `/graphql` and `POST /chat/commands`.
 *
 * Only a caller holding the gateway key may speak for a requester: the chat
 * route requires it and the GraphQL mutation checks it through the context.
 */
export function createHttpApp(deps: HttpAppDeps): Hono {
  const app = new Hono();

  app.use(
    "*",
    bodyLimit({
      maxSize: 64 * 1024,
      onError: (c) => c.json({ error: "request-too-large" }, 413)
    })
  );

  app.get("/healthcheck", async (c) => {
    const { statusCode, body } = healthcheckResponse(await deps.health.healthStatus());
    return c.json(body, statusCode);
  });

  app.on(["GET", "POST"], "/graphql", async (c) => {
    const faucet = deps.faucet;
    if (!faucet) {
      return c.json({ error: "faucet-unavailable" }, 503);
    }

    let body: unknown;
    if (c.req.method === "POST") {
      try {
        body = await c.req.json();
      } catch {
        return c.json({ error: "invalid-json-body" }, 400);
      }
    }

    const headers = new HeaderMap();
    c.req.raw.headers.forEach((value, key) => {
      headers.set(key, value);
    });
    const trustedGateway = isGateway(c, deps.gatewayKey);

    const response = await faucet.apollo.executeHTTPGraphQLRequest({
      httpGraphQLRequest: { method: c.req.method, headers, search: new URL(c.req.url).search, body },
      context: async () => ({ faucet: faucet.api, trustedGateway })
    });

    let payload = "";
    if (response.body.kind === "complete") {
      payload = response.body.string;
    } else {
      for await (const chunk of response.body.asyncIterator) {
        payload += chunk;
      }
    }
    return new Response(payload, { status: response.status ?? 200, headers: [...response.headers] });
  });

  app.post("/chat/commands", async (c) => {
    const denied = gatewayAuth(c, deps.gatewayKey);
    if (denied) {
      return denied;
    }
    if (!deps.faucet) {
      return c.json({ error: "faucet-unavailable" }, 503);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "invalid-json-body" }, 400);
    }
    const message = parseChatMessage(body);
    if (!message) {
      return c.json({ error: "invalid-chat-message" }, 400);
    }

    const reply = await handleChatCommand(deps.faucet.api, message, deps.faucet.chat);
    return c.json({ reply });
  });

  app.notFound((c) => c.json({ error: "not-found" }, 404));

  app.onError((error, c) => {
    logger.error("http-request-failed", { path: c.req.path, error: errorMessage(error) });
    return c.json({ error: "internal-error" }, 500);
  });

  return app;
}

/** Serves `app` on `port`; resolves with the bound port once listening. */
export function listenHttp(app: Hono, port: number): Promise<{ server: Server; port: number }> {
  return new Promise((resolve, reject) => {
    const server: Server = serve({ fetch: app.fetch, port }, (info) => {
      server.off("error", reject);
      resolve({ server, port: info.port });
    });
    server.once("error", reject);
  });
}

export function closeHttp(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
