import { z } from "zod";

const RequestId = z.union([z.number(), z.string()]);

export const ListToolsRequest = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.literal("tools/list"),
  id: z.number().int(),
});

export const CallToolRequest = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.literal("tools/call"),
  params: z.object({
    name: z.string().min(1),
    arguments: z.record(z.unknown()),
  }),
  id: z.number().int(),
});

// Inbound request or notification, as read by the mock server
export const RpcMessage = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string(),
  params: z.unknown().optional(),
  id: RequestId.nullable().optional(),
});

export const ToolCallParams = z.object({
  name: z.string(),
  arguments: z.unknown().optional(),
});

export const WeatherArgs = z.object({ city: z.string() });

export const SearchFilesArgs = z.object({
  pattern: z.string(),
  // a non-string directory counts as absent
  directory: z.string().optional().catch(undefined),
});

export const ReadResourceParams = z.object({ uri: z.string() });

// Loose view of a reply; only used to describe it in logs
export const RpcReply = z.object({
  id: RequestId.nullable().optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional(),
});

export type ListToolsRequestT = z.infer<typeof ListToolsRequest>;
export type CallToolRequestT = z.infer<typeof CallToolRequest>;
export type RpcMessageT = z.infer<typeof RpcMessage>;
