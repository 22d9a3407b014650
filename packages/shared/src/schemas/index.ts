/**
 * Zodバリデーションスキーマ
 */
import { z } from 'zod';

// JSON-RPCエンベロープ
export const JsonRpcIdSchema = z.union([z.number().int(), z.string()]);

export const JsonRpcErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcEnvelopeSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: z.union([JsonRpcIdSchema, z.null()]).optional(),
    method: z.string().optional(),
    params: z.unknown().optional(),
    result: z.unknown().optional(),
    error: JsonRpcErrorObjectSchema.optional(),
  })
  .passthrough();

// initialize の応答
export const ServerInfoSchema = z
  .object({
    name: z.string(),
    version: z.string(),
  })
  .passthrough();

export const InitializeResultSchema = z
  .object({
    protocolVersion: z.string().optional(),
    capabilities: z.record(z.unknown()),
    serverInfo: ServerInfoSchema.optional(),
    instructions: z.string().optional(),
  })
  .passthrough();

// tools/call の応答
export const ToolContentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const ToolCallResultSchema = z
  .object({
    content: z.array(ToolContentBlockSchema),
    isError: z.boolean().optional(),
  })
  .passthrough();

// tools/list の応答
export const ToolDescriptorSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    inputSchema: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const ToolsListResultSchema = z.object({
  tools: z.array(ToolDescriptorSchema),
});

// 設定スキーマ
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const WorkerConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()),
  cwd: z.string().optional(),
  env: z.record(z.string()),
});

export const SessionConfigSchema = z.object({
  protocolVersion: z.string().min(1),
  clientName: z.string().min(1),
  clientVersion: z.string().min(1),
  handshakeTimeout: z.number().int().min(0),
  requestTimeout: z.number().int().min(0),
  shutdownTimeout: z.number().int().min(0),
});

export const ForecastConfigSchema = z.object({
  defaultDays: z.number().int().min(1).max(16),
  maxDays: z.number().int().min(1).max(16),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const TenkiConfigSchema = z.object({
  worker: WorkerConfigSchema,
  session: SessionConfigSchema,
  forecast: ForecastConfigSchema,
  logging: LoggingConfigSchema,
});

export const PartialTenkiConfigSchema = z.object({
  worker: WorkerConfigSchema.partial().optional(),
  session: SessionConfigSchema.partial().optional(),
  forecast: ForecastConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// スキーマから導出される型
export type InitializeResult = z.infer<typeof InitializeResultSchema>;
export type ServerInfo = z.infer<typeof ServerInfoSchema>;
export type ToolContentBlock = z.infer<typeof ToolContentBlockSchema>;
export type ToolCallResult = z.infer<typeof ToolCallResultSchema>;
export type ToolDescriptor = z.infer<typeof ToolDescriptorSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type TenkiConfig = z.infer<typeof TenkiConfigSchema>;
export type PartialTenkiConfig = z.infer<typeof PartialTenkiConfigSchema>;
