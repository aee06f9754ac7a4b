import { describe, it, expect, vi, afterEach } from "vitest";
import { decodeResponse, DecodeError, ResponseParseError, runProbe } from "../src/probe.js";
import { ConnectionError, ProbeConnection } from "../src/connection.js";
import { startMockServer, type MockServer } from "../src/mockServer.js";
import { callWeatherRequest, listToolsRequest } from "../src/requests.js";

describe("decodeResponse", () => {
  it("parses a JSON line", () => {
    expect(decodeResponse(Buffer.from('{"result":{"tools":[]}}\n', "utf8"))).toEqual({ result: { tools: [] } });
  });

  it("rejects invalid UTF-8", () => {
    expect(() => decodeResponse(Buffer.from([0x7b, 0xff, 0xfe, 0x7d]))).toThrow(DecodeError);
  });

  it("rejects an empty read", () => {
    expect(() => decodeResponse(Buffer.alloc(0))).toThrow("Response is not valid JSON (0 bytes)");
  });
});

describe("runProbe", () => {
  let server: MockServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it("prints both replies as indented JSON under their labels", async () => {
    server = await startMockServer({
      respond: (m) => (m.method === "tools/list" ? { result: { tools: [] } } : { result: { temperature: "20C" } }),
    });
    const lines: string[] = [];
    const out = await runProbe({ host: server.host, port: server.port, print: (l) => lines.push(l) });

    expect(lines).toEqual([
      "Tool list response:",
      '{\n  "result": {\n    "tools": []\n  }\n}',
      "\nWeather query response:",
      '{\n  "result": {\n    "temperature": "20C"\n  }\n}',
    ]);
    expect(out).toEqual({ tools: { result: { tools: [] } }, weather: { result: { temperature: "20C" } } });
  });

  it("sends the two literal requests in order on one connection", async () => {
    const seen: string[] = [];
    server = await startMockServer({
      respond: (m) => {
        seen.push(m.method);
        return { jsonrpc: "2.0", result: {}, id: m.id };
      },
    });
    await runProbe({ host: server.host, port: server.port, print: () => {} });

    expect(server.received.map((l) => JSON.parse(l))).toEqual([listToolsRequest, callWeatherRequest]);
    expect(seen).toEqual(["tools/list", "tools/call"]);
  });

  it("queries the default tool server end to end", async () => {
    server = await startMockServer();
    const out = await runProbe({ host: server.host, port: server.port, print: () => {} });

    expect(out.tools).toMatchObject({ jsonrpc: "2.0", id: 1 });
    expect(out.weather).toEqual({
      jsonrpc: "2.0",
      result: { content: [{ type: "text", text: "北京 weather:\nTemperature: 22°C\nConditions: sunny\nHumidity: 65%" }] },
      id: 2,
    });
  });

  it("raises ConnectionError and prints nothing when the server is down", async () => {
    const down = await startMockServer();
    await down.close();
    const print = vi.fn();

    await expect(runProbe({ host: down.host, port: down.port, print })).rejects.toBeInstanceOf(ConnectionError);
    expect(print).not.toHaveBeenCalled();
  });

  it("fails to parse the second reply when the server closes early", async () => {
    server = await startMockServer({ closeAfter: 1 });
    const lines: string[] = [];

    const p = runProbe({ host: server.host, port: server.port, print: (l) => lines.push(l) });
    await expect(p).rejects.toBeInstanceOf(ResponseParseError);
    await expect(p).rejects.toMatchObject({ byteLength: 0 });
    expect(lines[0]).toBe("Tool list response:");
    expect(lines).toHaveLength(2);

    const received = server.received;
    await vi.waitFor(() => expect(received).toHaveLength(2));
  });

  it("treats a reply longer than one read as complete", async () => {
    server = await startMockServer({ respond: (m) => ({ jsonrpc: "2.0", result: { padding: "x".repeat(64) }, id: m.id }) });

    await expect(
      runProbe({ host: server.host, port: server.port, readBytes: 16, print: () => {} }),
    ).rejects.toBeInstanceOf(ResponseParseError);
  });

  it("reports a bad port as ConnectionError", async () => {
    const print = vi.fn();
    await expect(runProbe({ host: "127.0.0.1", port: 70000, print })).rejects.toBeInstanceOf(ConnectionError);
    expect(print).not.toHaveBeenCalled();
  });

  it("keeps serving after a reply handler throws", async () => {
    server = await startMockServer({
      respond: () => {
        throw new Error("handler failed");
      },
    });

    await expect(runProbe({ host: server.host, port: server.port, print: () => {} })).rejects.toThrow();

    const conn = await ProbeConnection.open(server.host, server.port);
    conn.close();
    expect(server.received).toHaveLength(1);
  });
});
