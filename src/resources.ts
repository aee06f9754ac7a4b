import { ErrorCode, type Resource, type TextResourceContents } from "@modelcontextprotocol/sdk/types.js";
import { RpcError } from "./tools.js";

const HOSTS_URI = "file:///etc/hosts";

export function listResources(): Resource[] {
  return [
    { uri: HOSTS_URI, name: "hosts", mimeType: "text/plain" },
    { uri: "file:///var/log/system.log", name: "system.log", mimeType: "text/plain" },
  ];
}

// Only the hosts file has readable contents; the log is listed but not served.
export function readResource(uri: string): TextResourceContents[] {
  if (uri === HOSTS_URI) {
    return [{ uri, mimeType: "text/plain", text: "127.0.0.1 localhost\n::1 localhost\n" }];
  }
  throw new RpcError(ErrorCode.InvalidParams, "Resource not found");
}
