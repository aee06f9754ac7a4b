import type { CallToolRequestT, ListToolsRequestT } from "./shapes.js";

export const listToolsRequest: ListToolsRequestT = {
  jsonrpc: "2.0",
  method: "tools/list",
  id: 1,
};

export const callWeatherRequest: CallToolRequestT = {
  jsonrpc: "2.0",
  method: "tools/call",
  params: {
    name: "get_weather",
    arguments: { city: "北京" },
  },
  id: 2,
};

/** Serializes one message as a single newline-terminated UTF-8 line. */
export function frame(message: ListToolsRequestT | CallToolRequestT): Buffer {
  return Buffer.from(JSON.stringify(message) + "\n", "utf8");
}
