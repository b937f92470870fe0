export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export type ConversationRole = "system" | "user" | "assistant";

export type ConversationTurn = {
  role: ConversationRole;
  content: string;
};

export type CommandRequest = {
  text: string;
  context?: ConversationTurn[];
};

export type ToolName = "control_spotify" | "manage_calendar" | "general_query";

export type ResolvedIntent =
  | { type: "tool_call"; tool: string; arguments: JsonObject; content?: string }
  | { type: "direct_response"; content: string }
  | { type: "error"; message: string };

export type ActionStatus = "success" | "error" | "info";

export interface ActionResult {
  status: ActionStatus;
  message: string;
  [field: string]: JsonValue;
}

export type CommandResponse = {
  type: ResolvedIntent["type"];
  tool?: string;
  arguments?: JsonObject;
  content?: string;
  error?: string;
  execution_result?: ActionResult;
};

export type PlaybackAction = "play" | "pause" | "skip" | "next" | "previous";

export type SearchType = "track" | "artist" | "playlist" | "album";

export const SEARCH_TYPES: readonly SearchType[] = ["track", "artist", "playlist", "album"];

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** What the dispatcher needs from a media integration. */
export interface MediaControl {
  controlPlayback(action: PlaybackAction): Promise<ActionResult>;
  searchAndPlay(query: string, type: SearchType): Promise<ActionResult>;
  getCurrentTrack(): Promise<ActionResult>;
}
