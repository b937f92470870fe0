import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import type { Env } from "../utils/env";
import type { Logger } from "../utils/logger";
import { describeError } from "../utils/errors";
import { type ConversationTurn, type ResolvedIntent, isJsonObject } from "../types";
import { SYSTEM_PROMPT, TOOLS } from "./tools";

/** The one call the resolver makes; OpenAI in production, a fake in tests. */
export interface ChatBackend {
  complete(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export function createChatBackend(env: Env): ChatBackend {
  const openai = new OpenAI({ apiKey: env.LLM_API_KEY, baseURL: env.LLM_BASE_URL, maxRetries: 0 });
  return {
    complete: (params) => openai.chat.completions.create(params),
  };
}

export type ResolverSettings = {
  model: string;
  temperature: number;
  maxTokens: number;
};

export class IntentResolver {
  private backend: ChatBackend;
  private settings: ResolverSettings;
  private logger: Logger;

  constructor(backend: ChatBackend, settings: ResolverSettings, logger: Logger) {
    this.backend = backend;
    this.settings = settings;
    this.logger = logger;
  }

  static fromEnv(env: Env, logger: Logger): IntentResolver {
    return new IntentResolver(
      createChatBackend(env),
      { model: env.LLM_MODEL, temperature: env.LLM_TEMPERATURE, maxTokens: env.LLM_MAX_TOKENS },
      logger
    );
  }

  buildMessages(text: string, context?: ConversationTurn[]): ChatCompletionMessageParam[] {
    const messages: ChatCompletionMessageParam[] = [{ role: "system", content: SYSTEM_PROMPT }];
    for (const turn of context ?? []) {
      messages.push({ role: turn.role, content: turn.content });
    }
    messages.push({ role: "user", content: text });
    return messages;
  }

  async resolve(text: string, context?: ConversationTurn[]): Promise<ResolvedIntent> {
    let completion: ChatCompletion;
    try {
      completion = await this.backend.complete({
        model: this.settings.model,
        messages: this.buildMessages(text, context),
        tools: [...TOOLS],
        tool_choice: "auto",
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
      });
    } catch (err) {
      this.logger.error("LLM request failed", { message: describeError(err) });
      return { type: "error", message: describeError(err) };
    }

    const message = completion.choices[0]?.message;
    if (!message) {
      this.logger.warn("LLM returned no choices", { model: this.settings.model });
      return { type: "error", message: "Language model returned no choices" };
    }

    // Only the first proposed tool call runs; the rest are ignored.
    const toolCall = message.tool_calls?.[0];
    if (!toolCall) {
      const content = message.content ?? "";
      this.logger.debug("LLM direct response", { length: content.length });
      return { type: "direct_response", content };
    }

    const tool = toolCall.function.name;
    const rawArgs = toolCall.function.arguments.trim();
    let parsed: unknown;
    try {
      parsed = rawArgs ? JSON.parse(rawArgs) : {};
    } catch (err) {
      this.logger.error("Tool arguments are not valid JSON", { tool, message: describeError(err) });
      return { type: "error", message: `Invalid arguments for ${tool}: ${describeError(err)}` };
    }
    if (!isJsonObject(parsed)) {
      this.logger.error("Tool arguments are not an object", { tool });
      return { type: "error", message: `Invalid arguments for ${tool}: expected a JSON object` };
    }

    if ((message.tool_calls?.length ?? 0) > 1) {
      this.logger.warn("Ignoring extra tool calls", { tool, count: message.tool_calls?.length });
    }
    this.logger.info("Tool called", { tool, arguments: parsed });

    return message.content
      ? { type: "tool_call", tool, arguments: parsed, content: message.content }
      : { type: "tool_call", tool, arguments: parsed };
  }
}
