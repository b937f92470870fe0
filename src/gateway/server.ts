import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { v4 as uuidv4 } from "uuid";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import type { CommandRequest, CommandResponse, ConversationRole, ConversationTurn } from "../types";
import type { Logger } from "../utils/logger";
import { describeError } from "../utils/errors";
import type { CommandPipeline } from "./pipeline";

const MAX_BODY_BYTES = 1024 * 1024;
const ROLES: readonly ConversationRole[] = ["system", "user", "assistant"];

class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.statusCode = statusCode;
  }
}

function writeJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

function setCors(res: ServerResponse): void {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new HttpError(413, "Request body too large");
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseTurn(value: unknown, index: number): ConversationTurn {
  if (!isRecord(value)) throw new HttpError(422, `context[${index}] must be an object`);
  const role = ROLES.find((r) => r === value.role);
  if (!role) throw new HttpError(422, `context[${index}].role must be one of ${ROLES.join(", ")}`);
  if (typeof value.content !== "string") throw new HttpError(422, `context[${index}].content must be a string`);
  return { role, content: value.content };
}

export function parseCommandRequest(raw: string): CommandRequest {
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Request body must be valid JSON");
  }
  if (!isRecord(body)) throw new HttpError(422, "Request body must be a JSON object");
  if (typeof body.text !== "string") throw new HttpError(422, "text must be a string");
  if (body.context === undefined || body.context === null) return { text: body.text };
  if (!Array.isArray(body.context)) throw new HttpError(422, "context must be an array");
  return { text: body.text, context: body.context.map(parseTurn) };
}

function rawToText(raw: RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  return Buffer.from(raw).toString("utf8");
}

export type Gateway = {
  listen: (port: number, host?: string) => Promise<AddressInfo>;
  close: () => Promise<void>;
};

export function createGateway(pipeline: CommandPipeline, logger: Logger): Gateway {
  const handle = async (req: IncomingMessage, res: ServerResponse, log: Logger) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    setCors(res);

    if (req.method === "OPTIONS") {
      res.statusCode = 204;
      res.end();
      return;
    }

    if (req.method === "GET" && url.pathname === "/") {
      writeJson(res, 200, { message: "AI Voice Assistant API", status: "running" });
      return;
    }

    if (req.method === "GET" && url.pathname === "/health") {
      // Static claim; integrations are not probed here.
      writeJson(res, 200, {
        status: "healthy",
        timestamp: new Date().toISOString(),
        services: { llm: "connected", spotify: "checking...", calendar: "not_configured" },
      });
      return;
    }

    if (req.method === "POST" && url.pathname === "/process") {
      const command = parseCommandRequest(await readBody(req));
      const response = await pipeline.process(command.text, command.context, log);
      writeJson(res, 200, response);
      return;
    }

    writeJson(res, 404, { error: "Not found" });
  };

  const server = createServer((req, res) => {
    const log = logger.child({ requestId: uuidv4() });
    log.debug("HTTP request", { method: req.method, url: req.url });
    handle(req, res, log).catch((err) => {
      if (err instanceof HttpError) {
        log.warn("Rejected request", { status: err.statusCode, message: err.message });
        writeJson(res, err.statusCode, { error: err.message });
        return;
      }
      log.error("HTTP handler failed", { message: describeError(err) });
      if (res.headersSent) {
        res.end();
        return;
      }
      writeJson(res, 500, { error: describeError(err) });
    });
  });

  const wss = new WebSocketServer({ server, path: "/ws" });
  // ws re-emits the HTTP server's errors here; listen() reports them to its caller.
  wss.on("error", (err) => logger.error("WebSocket server error", { message: err.message }));

  wss.on("connection", (ws) => {
    const log = logger.child({ connectionId: uuidv4() });
    log.info("WebSocket connection established");
    // Messages on one connection are answered strictly in arrival order.
    let lane: Promise<void> = Promise.resolve();

    const processMessage = async (text: string) => {
      log.info("Received via WebSocket", { text });
      let response: CommandResponse;
      try {
        response = await pipeline.process(text, undefined, log);
      } catch (err) {
        log.error("WebSocket message failed", { message: describeError(err) });
        response = { type: "error", error: describeError(err) };
      }
      if (ws.readyState !== WebSocket.OPEN) {
        log.warn("Connection closed before response was sent");
        return;
      }
      ws.send(JSON.stringify(response), (err) => {
        if (err) log.error("WebSocket send failed", { message: err.message });
      });
    };

    ws.on("message", (raw) => {
      const text = rawToText(raw);
      lane = lane
        .then(() => processMessage(text))
        .catch((err) => log.error("WebSocket lane failure", { message: describeError(err) }));
    });

    ws.on("error", (err) => log.error("WebSocket error", { message: err.message }));
    ws.on("close", () => log.info("WebSocket connection closed"));
  });

  const listen = (port: number, host?: string) =>
    new Promise<AddressInfo>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("Server is not listening on a TCP port"));
          return;
        }
        resolve(address);
      });
    });

  const close = async () => {
    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    if (!server.listening) return;
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  };

  return { listen, close };
}
