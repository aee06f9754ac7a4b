import type { Resource, Tool } from "@modelcontextprotocol/sdk/types.js";

export type MockCommand =
  | { kind: "start"; host: string; port: number }
  | { kind: "list-tools" }
  | { kind: "list-resources" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const usage = "usage: mock_server [start [--address host:port] | list-tools | list-resources]";

export function parseAddress(address: string): { host: string; port: number } {
  const i = address.lastIndexOf(":");
  const host = i > 0 ? address.slice(0, i) : "";
  const digits = address.slice(i + 1);
  const port = Number(digits);
  if (!host || !/^\d+$/.test(digits) || port > 65535) {
    throw new UsageError(`Invalid address: ${address}`);
  }
  return { host, port };
}

/** `argv` excludes the node binary and script path. */
export function parseMockCommand(argv: string[], fallback: { host: string; port: number }): MockCommand {
  const [cmd = "start", ...rest] = argv;
  switch (cmd) {
    case "start": {
      let endpoint = fallback;
      for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (arg === "--address" || arg === "-a") {
          const value = rest[++i];
          if (value === undefined) throw new UsageError(`${arg} needs a value`);
          endpoint = parseAddress(value);
        } else if (arg.startsWith("--address=")) {
          endpoint = parseAddress(arg.slice("--address=".length));
        } else {
          throw new UsageError(`Unknown option: ${arg}`);
        }
      }
      return { kind: "start", ...endpoint };
    }
    case "list-tools":
    case "list-resources":
      if (rest.length > 0) throw new UsageError(`Unexpected argument: ${rest[0]}`);
      return cmd === "list-tools" ? { kind: "list-tools" } : { kind: "list-resources" };
    default:
      throw new UsageError(`Unknown command: ${cmd}`);
  }
}

function describeProperty(prop: unknown): string {
  if (typeof prop === "object" && prop !== null && "description" in prop && typeof prop.description === "string") {
    return prop.description;
  }
  return "";
}

export function formatTools(tools: Tool[]): string[] {
  const lines: string[] = [];
  for (const tool of tools) {
    lines.push(`Tool: ${tool.name}`);
    lines.push(`Description: ${tool.description ?? ""}`);
    lines.push("Parameters:");
    for (const [name, prop] of Object.entries(tool.inputSchema.properties ?? {})) {
      lines.push(`  - ${name}: ${describeProperty(prop)}`);
    }
    lines.push("");
  }
  return lines;
}

export function formatResources(resources: Resource[]): string[] {
  return ["Available resources:", ...resources.map((r) => `- ${r.uri}`)];
}
