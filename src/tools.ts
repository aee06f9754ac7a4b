import { ErrorCode, type CallToolResult, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { SearchFilesArgs, WeatherArgs } from "./shapes.js";
import { logger } from "./log.js";

export class RpcError extends Error {
  constructor(public code: number, message: string) {
    super(message);
    this.name = "RpcError";
  }
}

export function textContent(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

export function listTools(): Tool[] {
  return [
    {
      name: "search_files",
      description: "Search the file system for files matching a pattern",
      inputSchema: {
        type: "object",
        properties: {
          pattern: { type: "string", description: "Search pattern (wildcards allowed)" },
          directory: { type: "string", description: "Directory to search" },
        },
        required: ["pattern"],
      },
    },
    {
      name: "get_weather",
      description: "Get weather information for a city",
      inputSchema: {
        type: "object",
        properties: {
          city: { type: "string", description: "City name" },
        },
        required: ["city"],
      },
    },
  ];
}

function invalidParams(name: string, detail: string): RpcError {
  return new RpcError(ErrorCode.InvalidParams, `Invalid params for ${name}: ${detail}`);
}

export function callTool(name: string, args: unknown): CallToolResult {
  switch (name) {
    case "get_weather": {
      const parsed = WeatherArgs.safeParse(args);
      if (!parsed.success) throw invalidParams(name, "city is required");
      const { city } = parsed.data;
      logger.debug("tool.get_weather", { city });
      // Canned report; no weather service behind it
      return textContent(`${city} weather:\nTemperature: 22°C\nConditions: sunny\nHumidity: 65%`);
    }
    case "search_files": {
      const parsed = SearchFilesArgs.safeParse(args);
      if (!parsed.success) throw invalidParams(name, "pattern is required");
      const { pattern, directory = "." } = parsed.data;
      logger.debug("tool.search_files", { pattern, directory });
      return textContent(
        `Searched ${directory} for '${pattern}'\nFound files:\n1. /path/to/file1.txt\n2. /path/to/file2.log`,
      );
    }
    default:
      throw new RpcError(ErrorCode.MethodNotFound, "Tool not found");
  }
}
