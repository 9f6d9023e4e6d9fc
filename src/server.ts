/**
 * peerweave HTTP server.
 *
 * Hosts the peer-to-peer routes of one node. The handler returns true
 * when it answered the request; everything else gets a 404.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import type { Logger } from "./types.js";
import { errorMessage } from "./utils/guards.js";

export type MeshHttpHandler = (
  req: IncomingMessage,
  res: ServerResponse,
) => Promise<boolean>;

export interface MeshHttpServerOptions {
  port: number;
  host?: string;
  logger: Logger;
}

/** Thrown by readJsonBody for a body that is not valid JSON. */
export class InvalidJsonBodyError extends Error {
  constructor() {
    super("Invalid JSON body");
    this.name = "InvalidJsonBodyError";
  }
}

/**
 * Read and parse a JSON body from a Node.js IncomingMessage.
 * An empty body resolves to undefined.
 */
export function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const raw = Buffer.concat(chunks).toString("utf-8");
      if (!raw) { resolve(undefined); return; }
      try { resolve(JSON.parse(raw)); }
      catch { reject(new InvalidJsonBodyError()); }
    });
    req.on("error", reject);
  });
}

/** Write a JSON response. */
export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

/**
 * Create and start the HTTP server.
 * Resolves once the socket is listening; port 0 picks a free port.
 */
export function startMeshHttpServer(
  handler: MeshHttpHandler,
  opts: MeshHttpServerOptions,
): Promise<Server> {
  const { port, host = "127.0.0.1", logger } = opts;

  const server = createServer(async (req, res) => {
    try {
      const handled = await handler(req, res);
      if (!handled) {
        sendJson(res, 404, { error: "not found" });
      }
    } catch (err) {
      logger.error(`[peerweave:http] unhandled error: ${errorMessage(err)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: "internal server error" });
      }
    }
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      logger.info(`[peerweave:http] server listening on ${host}:${listeningPort(server)}`);
      resolve(server);
    });
  });
}

/** Port a listening server is bound to (useful after listening on 0). */
export function listeningPort(server: Server): number {
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : 0;
}

/**
 * Stop the HTTP server gracefully.
 */
export function stopMeshHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
    // Idle keep-alive sockets would hold close() open.
    server.closeIdleConnections();
  });
}
