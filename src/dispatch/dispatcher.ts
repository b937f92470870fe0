import {
  type ActionResult,
  type JsonObject,
  type MediaControl,
  type PlaybackAction,
  SEARCH_TYPES,
  type SearchType,
  type ToolName,
} from "../types";
import { TOOL_NAMES } from "../llm/tools";
import type { Logger } from "../utils/logger";
import { describeError } from "../utils/errors";

export const CALENDAR_UNAVAILABLE = "Calendar integration coming soon!";

const PLAYBACK_ACTIONS: readonly PlaybackAction[] = ["play", "pause", "skip", "next", "previous"];

function isToolName(tool: string): tool is ToolName {
  return TOOL_NAMES.some((name) => name === tool);
}

function stringArg(args: JsonObject, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

function toSearchType(value: string | undefined): SearchType {
  return SEARCH_TYPES.find((t) => t === value) ?? "track";
}

function toPlaybackAction(value: string | undefined): PlaybackAction | undefined {
  return PLAYBACK_ACTIONS.find((a) => a === value);
}

/** Runs a resolved tool call against its integration and reports the outcome. */
export class ActionDispatcher {
  private media: MediaControl;
  private logger: Logger;

  constructor(media: MediaControl, logger: Logger) {
    this.media = media;
    this.logger = logger;
  }

  async dispatch(tool: string, args: JsonObject): Promise<ActionResult> {
    if (!isToolName(tool)) {
      this.logger.warn("Unknown tool requested", { tool });
      return { status: "error", message: `Unknown tool: ${tool}` };
    }

    try {
      switch (tool) {
        case "control_spotify":
          return await this.controlSpotify(args);
        case "manage_calendar":
          return { status: "info", message: CALENDAR_UNAVAILABLE };
        case "general_query":
          return { status: "success", message: stringArg(args, "response") ?? "" };
      }
    } catch (err) {
      this.logger.error("Tool execution failed", { tool, message: describeError(err) });
      return { status: "error", message: describeError(err) };
    }
  }

  private async controlSpotify(args: JsonObject): Promise<ActionResult> {
    const action = stringArg(args, "action");

    const playback = toPlaybackAction(action);
    if (playback) return this.media.controlPlayback(playback);

    if (action === "search") {
      return this.media.searchAndPlay(stringArg(args, "query") ?? "", toSearchType(stringArg(args, "type")));
    }
    if (action === "current") return this.media.getCurrentTrack();

    this.logger.warn("Unsupported Spotify action", { action });
    return { status: "error", message: `Unsupported Spotify action: ${action ?? "(none)"}` };
  }
}
