import { TextDecoder } from "util";
import { config } from "./config.js";
import { ProbeConnection } from "./connection.js";
import { logger } from "./log.js";
import { callWeatherRequest, frame, listToolsRequest } from "./requests.js";
import { RpcReply, type CallToolRequestT, type ListToolsRequestT } from "./shapes.js";

const log = logger.child({ component: "probe" });

export class DecodeError extends Error {
  constructor(public byteLength: number) {
    super(`Response is not valid UTF-8 (${byteLength} bytes)`);
    this.name = "DecodeError";
  }
}

export class ResponseParseError extends Error {
  constructor(public byteLength: number, public preview: string) {
    super(`Response is not valid JSON (${byteLength} bytes)`);
    this.name = "ResponseParseError";
  }
}

export interface ProbeOptions {
  host?: string;
  port?: number;
  readBytes?: number;
  print?: (line: string) => void;
}

export interface ProbeResult {
  tools: unknown;
  weather: unknown;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function decodeResponse(bytes: Uint8Array): unknown {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    throw new DecodeError(bytes.length);
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new ResponseParseError(bytes.length, logger.preview(text));
  }
}

function describeReply(value: unknown): "result" | "error" | "unknown" {
  const reply = RpcReply.safeParse(value);
  if (!reply.success) return "unknown";
  if (reply.data.error) return "error";
  return reply.data.result !== undefined ? "result" : "unknown";
}

async function exchange(
  conn: ProbeConnection,
  request: ListToolsRequestT | CallToolRequestT,
  readBytes: number,
): Promise<unknown> {
  const start = Date.now();
  await conn.send(frame(request));
  const bytes = await conn.readOnce(readBytes);
  // A reply longer than one read is taken as complete
  const value = decodeResponse(bytes);
  log.info("probe.exchange", {
    method: request.method,
    id: request.id,
    bytes: bytes.length,
    reply: describeReply(value),
    elapsed_ms: Date.now() - start,
  });
  return value;
}

/**
 * Sends `tools/list` then a `get_weather` call over one connection and
 * prints each reply as indented JSON under its label.
 */
export async function runProbe(opts: ProbeOptions = {}): Promise<ProbeResult> {
  const host = opts.host ?? config.host;
  const port = opts.port ?? config.port;
  const readBytes = opts.readBytes ?? config.readBytes;
  const print = opts.print ?? ((line: string) => console.log(line));

  const conn = await ProbeConnection.open(host, port, readBytes);
  log.info("probe.connected", { host, port });
  try {
    const tools = await exchange(conn, listToolsRequest, readBytes);
    print("Tool list response:");
    print(JSON.stringify(tools, null, 2));

    const weather = await exchange(conn, callWeatherRequest, readBytes);
    print("\nWeather query response:");
    print(JSON.stringify(weather, null, 2));

    return { tools, weather };
  } finally {
    conn.close();
  }
}
