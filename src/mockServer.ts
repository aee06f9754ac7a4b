import { createServer, type Socket } from "net";
import { createInterface } from "readline";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { ReadResourceParams, RpcMessage, ToolCallParams, type RpcMessageT } from "./shapes.js";
import { callTool, listTools, RpcError } from "./tools.js";
import { listResources, readResource } from "./resources.js";
import { logger } from "./log.js";

const log = logger.child({ component: "mock" });

export interface MockServerOptions {
  host?: string;
  port?: number;
  /** Replaces the default replies; return undefined to send nothing. */
  respond?: (message: RpcMessageT) => unknown;
  /** Half-close each connection after this many replies. */
  closeAfter?: number;
}

export interface MockServer {
  host: string;
  port: number;
  /** Raw request lines in arrival order, across all connections. */
  received: string[];
  close(): Promise<void>;
}

type RequestId = string | number | null;

function reply(id: RequestId, result: unknown) {
  return { jsonrpc: "2.0", result, id };
}

function errorReply(id: RequestId, code: number, message: string) {
  return { jsonrpc: "2.0", error: { code, message }, id };
}

export function handleMessage(message: RpcMessageT): unknown {
  const id = message.id ?? null;
  try {
    switch (message.method) {
      case "tools/list":
        return reply(id, { tools: listTools() });
      case "tools/call": {
        const params = ToolCallParams.safeParse(message.params);
        if (!params.success) return errorReply(id, ErrorCode.InvalidParams, "Invalid params");
        return reply(id, callTool(params.data.name, params.data.arguments));
      }
      case "resources/list":
        return reply(id, { resources: listResources() });
      case "resources/read": {
        const params = ReadResourceParams.safeParse(message.params);
        if (!params.success) return errorReply(id, ErrorCode.InvalidParams, "Invalid params");
        return reply(id, { contents: readResource(params.data.uri) });
      }
      default:
        return errorReply(id, ErrorCode.MethodNotFound, "Method not found");
    }
  } catch (e) {
    if (e instanceof RpcError) return errorReply(id, e.code, e.message);
    throw e;
  }
}

function parseLine(line: string): RpcMessageT | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    log.warn("mock.bad_json", { preview: logger.preview(line) });
    return undefined;
  }
  const parsed = RpcMessage.safeParse(raw);
  if (!parsed.success) {
    log.warn("mock.bad_message", { preview: logger.preview(line) });
    return undefined;
  }
  return parsed.data;
}

/**
 * Line-delimited JSON-RPC tool server for exercising the probe locally.
 * Listens on an ephemeral port when `port` is 0.
 */
export function startMockServer(opts: MockServerOptions = {}): Promise<MockServer> {
  const host = opts.host ?? "127.0.0.1";
  const respond = opts.respond ?? handleMessage;
  const received: string[] = [];
  const sockets = new Set<Socket>();

  const server = createServer({ allowHalfOpen: true }, (socket) => {
    sockets.add(socket);
    let replies = 0;
    socket.on("close", () => sockets.delete(socket));
    socket.on("error", (err) => log.warn("mock.socket_error", { msg: err.message }));
    // Client closed its side; finish ours
    socket.on("end", () => socket.end());

    const lines = createInterface({ input: socket, crlfDelay: Infinity });
    lines.on("line", (line) => {
      if (!line.trim()) return;
      received.push(line);
      if (opts.closeAfter !== undefined && replies >= opts.closeAfter) return;
      const message = parseLine(line);
      if (!message) return;
      log.debug("mock.request", { method: message.method, id: message.id });
      let out: unknown;
      try {
        out = respond(message);
      } catch (e) {
        log.error("mock.handler_error", { method: message.method, msg: String(e instanceof Error ? e.message : e) });
        socket.destroy();
        return;
      }
      if (out === undefined) return;
      socket.write(JSON.stringify(out) + "\n");
      replies++;
      if (opts.closeAfter !== undefined && replies >= opts.closeAfter) socket.end();
    });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port ?? 0, host, () => {
      server.off("error", reject);
      const addr = server.address();
      const port = addr !== null && typeof addr === "object" ? addr.port : (opts.port ?? 0);
      log.info("mock.listening", { host, port });
      resolve({
        host,
        port,
        received,
        close: () =>
          new Promise<void>((done, fail) => {
            for (const s of sockets) s.destroy();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
