/**
 * Zod schemas for everything that crosses a trust boundary:
 * frames read from the peer, protocol results, and the config file.
 */
import { z } from 'zod';

// ============================================================================
// JSON-RPC 2.0 wire messages
// ============================================================================

export const JsonRpcIdSchema = z.union([z.string(), z.number()]);

export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: JsonRpcIdSchema,
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export const JsonRpcNotificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export const JsonRpcResponseSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    // null is what peers send when they could not read the request id
    id: z.union([JsonRpcIdSchema, z.null()]),
    result: z.unknown().optional(),
    error: JsonRpcErrorSchema.optional(),
  })
  .refine((message) => 'result' in message || message.error !== undefined, {
    message: 'Response must carry either a result or an error',
  });

/** Order matters: a request also satisfies the notification shape. */
export const JsonRpcMessageSchema = z.union([
  JsonRpcRequestSchema,
  JsonRpcNotificationSchema,
  JsonRpcResponseSchema,
]);

// ============================================================================
// MCP payloads (unknown fields are preserved)
// ============================================================================

export const ImplementationSchema = z
  .object({
    name: z.string(),
    version: z.string(),
  })
  .passthrough();

export const InitializeResultSchema = z
  .object({
    protocolVersion: z.string(),
    capabilities: z.record(z.unknown()).default({}),
    serverInfo: ImplementationSchema,
    instructions: z.string().optional(),
  })
  .passthrough();

export const ToolSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    inputSchema: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const ListToolsResultSchema = z
  .object({
    tools: z.array(ToolSchema),
    nextCursor: z.string().nullish(),
  })
  .passthrough();

export const ContentSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    data: z.string().optional(),
    mimeType: z.string().optional(),
  })
  .passthrough();

export const CallToolResultSchema = z
  .object({
    content: z.array(ContentSchema).default([]),
    isError: z.boolean().optional(),
  })
  .passthrough();

export const ResourceSchema = z
  .object({
    uri: z.string(),
    name: z.string(),
    description: z.string().optional(),
    mimeType: z.string().optional(),
  })
  .passthrough();

export const ListResourcesResultSchema = z
  .object({
    resources: z.array(ResourceSchema),
    nextCursor: z.string().nullish(),
  })
  .passthrough();

export const ResourceContentsSchema = z
  .object({
    uri: z.string(),
    mimeType: z.string().optional(),
    text: z.string().optional(),
    blob: z.string().optional(),
  })
  .passthrough();

export const ReadResourceResultSchema = z
  .object({
    contents: z.array(ResourceContentsSchema),
  })
  .passthrough();

// ============================================================================
// Configuration file
// ============================================================================

export const ConfigFileSchema = z.record(z.unknown());
