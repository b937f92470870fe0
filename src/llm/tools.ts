import type { ChatCompletionTool } from "openai/resources/chat/completions";
import type { ToolName } from "../types";

export const SYSTEM_PROMPT = `You are a helpful voice assistant with access to Spotify and Calendar.
Be concise in responses since this is voice interaction.
Current date/time context will be provided when needed.
Always use the appropriate tool for user requests.`;

const controlSpotify: ChatCompletionTool = {
  type: "function",
  function: {
    name: "control_spotify",
    description: "Control Spotify playback and search for music",
    parameters: {
      type: "object",
      properties: {
        action: {
          type: "string",
          enum: ["play", "pause", "skip", "previous", "search", "current"],
          description: "The action to perform",
        },
        query: {
          type: "string",
          description: "Search query for songs, artists, or playlists",
        },
        type: {
          type: "string",
          enum: ["track", "artist", "playlist", "album"],
          description: "Type of content to search for",
        },
      },
      required: ["action"],
    },
  },
};

const manageCalendar: ChatCompletionTool = {
  type: "function",
  function: {
    name: "manage_calendar",
    description: "Create, update, delete or query calendar events",
    parameters: {
      type: "object",
      properties: {
        action: {
          type: "string",
          enum: ["create", "update", "delete", "query", "list"],
          description: "The calendar action to perform",
        },
        event_data: {
          type: "object",
          properties: {
            title: { type: "string" },
            date: { type: "string", description: "Date in YYYY-MM-DD format" },
            time: { type: "string", description: "Time in HH:MM format" },
            duration: { type: "integer", description: "Duration in minutes" },
            description: { type: "string" },
            attendees: { type: "array", items: { type: "string" } },
          },
        },
        query_params: {
          type: "object",
          properties: {
            date: { type: "string" },
            days_ahead: { type: "integer" },
          },
        },
      },
      required: ["action"],
    },
  },
};

const generalQuery: ChatCompletionTool = {
  type: "function",
  function: {
    name: "general_query",
    description: "Answer general questions that don't require specific tools",
    parameters: {
      type: "object",
      properties: {
        response: {
          type: "string",
          description: "The response to the user's question",
        },
      },
      required: ["response"],
    },
  },
};

export const TOOLS: readonly ChatCompletionTool[] = [controlSpotify, manageCalendar, generalQuery];

export const TOOL_NAMES: readonly ToolName[] = ["control_spotify", "manage_calendar", "general_query"];
