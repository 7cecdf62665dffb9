import { z } from 'zod';
import { MessageParseError } from './errors.js';
import type { Envelope } from './protocol-types.js';

// ─── Typed messages ───────────────────────────────────────────────

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ThinkingBlock {
  type: 'thinking';
  thinking: string;
  signature: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Envelope;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content?: string | Envelope[];
  isError?: boolean;
}

export type ContentBlock = TextBlock | ThinkingBlock | ToolUseBlock | ToolResultBlock;

export interface UserMessage {
  type: 'user';
  content: string | ContentBlock[];
  parentToolUseId?: string;
  sessionId?: string;
}

export interface AssistantMessage {
  type: 'assistant';
  content: ContentBlock[];
  model: string;
  parentToolUseId?: string;
  sessionId?: string;
}

export interface SystemMessage {
  type: 'system';
  subtype: string;
  data: Envelope;
}

export interface ResultMessage {
  type: 'result';
  subtype: string;
  durationMs: number;
  durationApiMs: number;
  isError: boolean;
  numTurns: number;
  sessionId: string;
  totalCostUsd?: number;
  usage?: Envelope;
  result?: string;
}

export interface StreamEvent {
  type: 'stream_event';
  uuid: string;
  sessionId: string;
  event: Envelope;
  parentToolUseId?: string;
}

export type Message = UserMessage | AssistantMessage | SystemMessage | ResultMessage | StreamEvent;

// ─── Wire schemas ─────────────────────────────────────────────────

const record = z.record(z.unknown());

const contentBlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('thinking'), thinking: z.string(), signature: z.string() }),
  z.object({ type: z.literal('tool_use'), id: z.string(), name: z.string(), input: record.default({}) }),
  z.object({
    type: z.literal('tool_result'),
    tool_use_id: z.string(),
    content: z.union([z.string(), z.array(record)]).nullish(),
    is_error: z.boolean().nullish(),
  }),
]);

type WireContentBlock = z.infer<typeof contentBlockSchema>;

/** user/assistant lines carry their payload in a nested `message` object. */
const conversationPayloadSchema = z.object({
  content: z.union([z.string(), z.array(contentBlockSchema)]),
  model: z.string().optional(),
});

const conversationEnvelopeSchema = z.object({
  message: conversationPayloadSchema.optional(),
  content: z.union([z.string(), z.array(contentBlockSchema)]).optional(),
  model: z.string().optional(),
  parent_tool_use_id: z.string().nullish(),
  session_id: z.string().nullish(),
});

const systemSchema = z.object({
  subtype: z.string(),
  data: record.optional(),
});

const resultSchema = z.object({
  subtype: z.string(),
  duration_ms: z.number().default(0),
  duration_api_ms: z.number().default(0),
  is_error: z.boolean().default(false),
  num_turns: z.number().default(0),
  session_id: z.string(),
  total_cost_usd: z.number().nullish(),
  usage: record.nullish(),
  result: z.string().nullish(),
});

const streamEventSchema = z.object({
  uuid: z.string(),
  session_id: z.string(),
  event: record,
  parent_tool_use_id: z.string().nullish(),
});

// ─── Parsing ──────────────────────────────────────────────────────

function parseWith<T extends z.ZodTypeAny>(schema: T, envelope: Envelope, what: string): z.infer<T> {
  const result = schema.safeParse(envelope);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new MessageParseError(`invalid ${what} message: ${issues}`, envelope);
  }
  return result.data;
}

function toContentBlock(block: WireContentBlock): ContentBlock {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'thinking':
      return { type: 'thinking', thinking: block.thinking, signature: block.signature };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result': {
      const result: ToolResultBlock = { type: 'tool_result', toolUseId: block.tool_use_id };
      if (block.content != null) result.content = block.content;
      if (block.is_error != null) result.isError = block.is_error;
      return result;
    }
  }
}

function toContent(content: string | WireContentBlock[]): string | ContentBlock[] {
  return typeof content === 'string' ? content : content.map(toContentBlock);
}

function optional<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

/**
 * Decode a conversation envelope into its typed message.
 * Throws MessageParseError for unknown types or missing fields.
 */
export function parseMessage(envelope: Envelope): Message {
  switch (envelope.type) {
    case 'user': {
      const parsed = parseWith(conversationEnvelopeSchema, envelope, 'user');
      const content = parsed.message?.content ?? parsed.content;
      if (content === undefined) {
        throw new MessageParseError('invalid user message: missing content', envelope);
      }
      return {
        type: 'user',
        content: toContent(content),
        parentToolUseId: optional(parsed.parent_tool_use_id),
        sessionId: optional(parsed.session_id),
      };
    }

    case 'assistant': {
      const parsed = parseWith(conversationEnvelopeSchema, envelope, 'assistant');
      const content = parsed.message?.content ?? parsed.content;
      const model = parsed.message?.model ?? parsed.model;
      if (content === undefined || typeof content === 'string') {
        throw new MessageParseError('invalid assistant message: content must be a block list', envelope);
      }
      if (model === undefined) {
        throw new MessageParseError('invalid assistant message: missing model', envelope);
      }
      return {
        type: 'assistant',
        content: content.map(toContentBlock),
        model,
        parentToolUseId: optional(parsed.parent_tool_use_id),
        sessionId: optional(parsed.session_id),
      };
    }

    case 'system': {
      const parsed = parseWith(systemSchema, envelope, 'system');
      return { type: 'system', subtype: parsed.subtype, data: parsed.data ?? envelope };
    }

    case 'result': {
      const parsed = parseWith(resultSchema, envelope, 'result');
      return {
        type: 'result',
        subtype: parsed.subtype,
        durationMs: parsed.duration_ms,
        durationApiMs: parsed.duration_api_ms,
        isError: parsed.is_error,
        numTurns: parsed.num_turns,
        sessionId: parsed.session_id,
        totalCostUsd: optional(parsed.total_cost_usd),
        usage: optional(parsed.usage),
        result: optional(parsed.result),
      };
    }

    case 'stream':
    case 'stream_event': {
      const parsed = parseWith(streamEventSchema, envelope, 'stream event');
      return {
        type: 'stream_event',
        uuid: parsed.uuid,
        sessionId: parsed.session_id,
        event: parsed.event,
        parentToolUseId: optional(parsed.parent_tool_use_id),
      };
    }

    default:
      throw new MessageParseError(`unknown message type: ${String(envelope.type)}`, envelope);
  }
}

/** Concatenated text blocks of an assistant message. */
export function assistantText(message: AssistantMessage): string {
  return message.content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('');
}
