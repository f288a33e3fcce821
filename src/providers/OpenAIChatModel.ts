/**
 * OpenAI Chat Model
 *
 * Chat completions with function tools. Tool-call arguments arrive as JSON
 * strings; a call whose arguments do not parse is passed on with an empty
 * argument object so tool validation can report it.
 */

import OpenAI from "openai";
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { GenerationError } from "../errors.js";
import type {
  GenerationRequest,
  GenerationResponse,
  GenerativeModel,
  ToolCall,
  Turn,
} from "./ProviderAdapter.js";

export interface OpenAIChatModelConfig {
  apiKey: string;
  model: string;
  temperature?: number;
}

export class OpenAIChatModel implements GenerativeModel {
  private client: OpenAI;
  private config: OpenAIChatModelConfig;

  constructor(config: OpenAIChatModelConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.config = config;
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: request.system },
      ...request.turns.map(toMessage),
    ];
    const tools: ChatCompletionTool[] | undefined =
      request.tools && request.tools.length > 0
        ? request.tools.map((tool) => ({
            type: "function" as const,
            function: {
              name: tool.name,
              description: tool.description,
              parameters: tool.parameters,
            },
          }))
        : undefined;

    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages,
          tools,
          temperature: request.temperature ?? this.config.temperature ?? 0.2,
        },
        { signal: request.signal },
      );

      const message = completion.choices[0]?.message;
      if (!message) {
        throw new GenerationError("Chat completion returned no choices");
      }

      const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: parseArguments(call.function.arguments),
      }));

      return { text: message.content ?? "", toolCalls };
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      console.error("[ChatModel] Generation failed:", error);
      throw new GenerationError("Chat completion request failed", error);
    }
  }
}

function toMessage(turn: Turn): ChatCompletionMessageParam {
  switch (turn.role) {
    case "user":
      return { role: "user", content: turn.content };
    case "assistant":
      return turn.toolCalls.length > 0
        ? {
            role: "assistant",
            content: turn.content || null,
            tool_calls: turn.toolCalls.map((call) => ({
              id: call.id,
              type: "function",
              function: {
                name: call.name,
                arguments: JSON.stringify(call.arguments),
              },
            })),
          }
        : { role: "assistant", content: turn.content };
    case "tool":
      return { role: "tool", tool_call_id: turn.callId, content: turn.content };
  }
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    console.warn("[ChatModel] Unparseable tool arguments:", error);
  }
  return {};
}
