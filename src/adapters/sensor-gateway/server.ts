import { createServer, type IncomingMessage, type ServerResponse } from "node:http";

import type { Logger } from "../../modules/warnings/types.js";
import { createNoopLogger } from "../../infrastructure/logging/logger.js";
import type { SensorGatewayConfig } from "./config.js";
import type { SensorGatewayService } from "./service.js";

export interface JsonResponse {
  statusCode: number;
  body: Record<string, unknown>;
}

export interface GatewayRequest {
  method: string;
  url: string;
  authorization: string | undefined;
}

function respondJson(res: ServerResponse, response: JsonResponse): void {
  res.statusCode = response.statusCode;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(response.body));
}

function toMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function isAuthorized(authorization: string | undefined, authToken: string | undefined): boolean {
  if (!authToken) {
    return true;
  }
  return authorization === `Bearer ${authToken}`;
}

function notFound(message: string): JsonResponse {
  return {
    statusCode: 404,
    body: { error: "NOT_FOUND", message }
  };
}

function decodePathSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      return undefined;
    }
    throw error;
  }
}

/** Routes one request. Kept apart from the socket so it can be called directly. */
export async function handleSensorGatewayRequest(
  request: GatewayRequest,
  config: Pick<SensorGatewayConfig, "authToken">,
  service: SensorGatewayService
): Promise<JsonResponse> {
  if (!isAuthorized(request.authorization, config.authToken)) {
    return {
      statusCode: 401,
      body: { error: "UNAUTHORIZED", message: "Valid bearer token is required" }
    };
  }

  if (request.method !== "GET") {
    return {
      statusCode: 405,
      body: { error: "METHOD_NOT_ALLOWED", message: "Only GET requests are supported" }
    };
  }

  const path = new URL(request.url, "http://localhost").pathname.replace(/\/+$/, "") || "/";

  if (path === "/health") {
    const health = await service.getHealth();
    return {
      statusCode: health.status === "ok" ? 200 : 503,
      body: { service: "sensor-gateway", ...health }
    };
  }

  if (path === "/sensors") {
    const snapshot = await service.getSnapshot();
    if (!snapshot) {
      return notFound("No sensor state has been published yet");
    }
    return { statusCode: 200, body: { ...snapshot } };
  }

  const match = /^\/sensors\/([^/]+)$/.exec(path);
  if (match?.[1]) {
    const groupId = decodePathSegment(match[1]);
    if (groupId === undefined) {
      return {
        statusCode: 400,
        body: { error: "BAD_REQUEST", message: "Area group id is not a valid URL path segment" }
      };
    }
    const group = await service.getGroup(groupId);
    if (!group) {
      return notFound(`Unknown area group: ${groupId}`);
    }
    return { statusCode: 200, body: { ...group } };
  }

  return notFound("Only GET /health, GET /sensors and GET /sensors/:groupId are supported");
}

export interface SensorGatewayServer {
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createSensorGatewayServer(
  config: SensorGatewayConfig,
  service: SensorGatewayService,
  logger: Logger = createNoopLogger()
): SensorGatewayServer {
  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    handleSensorGatewayRequest(
      {
        method: req.method ?? "GET",
        url: req.url ?? "/",
        authorization: req.headers.authorization
      },
      config,
      service
    )
      .then((response) => {
        respondJson(res, response);
      })
      .catch((error: unknown) => {
        logger.error("sensor gateway request failed", { error: toMessage(error) });
        respondJson(res, {
          statusCode: 500,
          body: { error: "INTERNAL_ERROR", message: toMessage(error) }
        });
      });
  });

  return {
    async start() {
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          resolve();
        });
      });
      const address = server.address();
      logger.info("sensor gateway listening", {
        host: typeof address === "object" && address ? address.address : config.host,
        port: typeof address === "object" && address ? address.port : config.port
      });
    },
    async stop() {
      if (!server.listening) {
        return;
      }

      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    }
  };
}
