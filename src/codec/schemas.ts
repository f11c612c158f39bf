/**
 * Zod schemas for every payload the server sends back.
 *
 * Objects use `.passthrough()`: fields the server adds beyond the modelled
 * ones are kept on the decoded value but never rejected.
 */

import { z } from 'zod';
import type { JsonObject, JsonValue } from '../types/json.js';
import type { Message, ToolCall } from '../types/message.js';
import type { GenerateChunk } from '../types/generate.js';
import type { ChatChunk } from '../types/chat.js';
import type { EmbedResponse } from '../types/embeddings.js';
import type { ProgressRecord } from '../types/progress.js';
import type {
  ModelDetails,
  ModelList,
  ModelInfo,
  RunningModelList,
} from '../types/models.js';
import type { VersionResponse } from '../types/health.js';

/**
 * Schema whose decoded output is `T`, accepting any input
 */
export type WireSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const JsonValueSchema: WireSchema<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema: WireSchema<JsonObject> = z.record(JsonValueSchema);

export const ToolCallSchema: WireSchema<ToolCall> = z
  .object({
    function: z
      .object({
        index: z.number().int().nonnegative().optional(),
        name: z.string().optional(),
        arguments: z.union([z.string(), JsonObjectSchema]).optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const MessageSchema: WireSchema<Message> = z
  .object({
    role: z.enum(['system', 'user', 'assistant', 'tool']),
    content: z.string().default(''),
    thinking: z.string().optional(),
    images: z.array(z.string()).nullable().optional().transform((images) => images ?? undefined),
    tool_calls: z.array(ToolCallSchema).optional(),
    tool_name: z.string().optional(),
  })
  .passthrough();

const metricsShape = {
  total_duration: z.number().optional(),
  load_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  prompt_eval_duration: z.number().optional(),
  eval_count: z.number().optional(),
  eval_duration: z.number().optional(),
};

export const GenerateChunkSchema: WireSchema<GenerateChunk> = z
  .object({
    model: z.string(),
    created_at: z.string().optional(),
    response: z.string(),
    thinking: z.string().optional(),
    done: z.boolean(),
    done_reason: z.string().optional(),
    context: z.array(z.number()).optional(),
    ...metricsShape,
  })
  .passthrough();

export const ChatChunkSchema: WireSchema<ChatChunk> = z
  .object({
    model: z.string(),
    created_at: z.string().optional(),
    message: MessageSchema,
    done: z.boolean(),
    done_reason: z.string().optional(),
    ...metricsShape,
  })
  .passthrough();

export const EmbedResponseSchema: WireSchema<EmbedResponse> = z
  .object({
    model: z.string(),
    embeddings: z.array(z.array(z.number())),
    total_duration: z.number().optional(),
    load_duration: z.number().optional(),
    prompt_eval_count: z.number().optional(),
  })
  .passthrough();

export const ProgressRecordSchema: WireSchema<ProgressRecord> = z
  .object({
    status: z.string(),
    digest: z.string().optional(),
    total: z.number().int().optional(),
    completed: z.number().int().optional(),
  })
  .passthrough();

export const ModelDetailsSchema: WireSchema<ModelDetails> = z
  .object({
    parent_model: z.string().optional(),
    format: z.string().optional(),
    family: z.string().optional(),
    families: z.array(z.string()).nullable().optional(),
    parameter_size: z.string().optional(),
    quantization_level: z.string().optional(),
  })
  .passthrough();

export const ModelListSchema: WireSchema<ModelList> = z
  .object({
    models: z.array(
      z
        .object({
          name: z.string(),
          model: z.string(),
          modified_at: z.string().optional(),
          size: z.number(),
          digest: z.string(),
          details: ModelDetailsSchema.optional(),
        })
        .passthrough()
    ),
  })
  .passthrough();

export const ModelInfoSchema: WireSchema<ModelInfo> = z
  .object({
    license: z.string().optional(),
    modelfile: z.string().optional(),
    parameters: z.string().optional(),
    template: z.string().optional(),
    system: z.string().optional(),
    details: ModelDetailsSchema.optional(),
    model_info: z.record(z.unknown()).optional(),
    capabilities: z.array(z.string()).optional(),
    modified_at: z.string().optional(),
  })
  .passthrough();

export const RunningModelListSchema: WireSchema<RunningModelList> = z
  .object({
    models: z.array(
      z
        .object({
          name: z.string(),
          model: z.string(),
          size: z.number(),
          digest: z.string(),
          details: ModelDetailsSchema.optional(),
          expires_at: z.string().optional(),
          size_vram: z.number().optional(),
        })
        .passthrough()
    ),
  })
  .passthrough();

export const VersionResponseSchema: WireSchema<VersionResponse> = z
  .object({ version: z.string() })
  .passthrough();

/**
 * Blob digest: "sha256:" followed by 64 lowercase hex characters
 */
export const DigestSchema = z.string().regex(/^sha256:[0-9a-f]{64}$/);
