import type { IntentResolver } from "../llm/client";
import type { ActionDispatcher } from "../dispatch/dispatcher";
import type { CommandResponse, ConversationTurn, ResolvedIntent } from "../types";
import type { Logger } from "../utils/logger";

function toResponse(intent: ResolvedIntent): CommandResponse {
  switch (intent.type) {
    case "tool_call": {
      const response: CommandResponse = { type: "tool_call", tool: intent.tool, arguments: intent.arguments };
      if (intent.content !== undefined) response.content = intent.content;
      return response;
    }
    case "direct_response":
      return { type: "direct_response", content: intent.content };
    case "error":
      return { type: "error", error: intent.message };
  }
}

/** text -> intent -> (action) -> response, shared by HTTP and WebSocket. */
export class CommandPipeline {
  private resolver: Pick<IntentResolver, "resolve">;
  private dispatcher: Pick<ActionDispatcher, "dispatch">;
  private logger: Logger;

  constructor(
    resolver: Pick<IntentResolver, "resolve">,
    dispatcher: Pick<ActionDispatcher, "dispatch">,
    logger: Logger
  ) {
    this.resolver = resolver;
    this.dispatcher = dispatcher;
    this.logger = logger;
  }

  async process(text: string, context?: ConversationTurn[], logger: Logger = this.logger): Promise<CommandResponse> {
    logger.info("Processing command", { text, contextTurns: context?.length ?? 0 });

    const intent = await this.resolver.resolve(text, context);
    const response = toResponse(intent);

    if (intent.type === "tool_call" && intent.tool) {
      response.execution_result = await this.dispatcher.dispatch(intent.tool, intent.arguments);
      logger.info("Tool executed", {
        tool: intent.tool,
        status: response.execution_result.status,
      });
    } else if (intent.type === "error") {
      logger.warn("Command could not be resolved", { error: intent.message });
    }

    return response;
  }
}
