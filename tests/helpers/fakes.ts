import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
  ChatCompletionMessageToolCall,
} from "openai/resources/chat/completions";
import type { ChatBackend } from "../../src/llm/client";
import type {
  CurrentPlayback,
  PlaybackTarget,
  SearchResults,
  SpotifyDevice,
  SpotifyTrack,
  SpotifyUser,
  SpotifyWebApi,
} from "../../src/spotify/api";
import type {
  ActionResult,
  ConversationTurn,
  MediaControl,
  PlaybackAction,
  ResolvedIntent,
  SearchType,
} from "../../src/types";

export function toolCall(name: string, args: string, id = "call_1"): ChatCompletionMessageToolCall {
  return { id, type: "function", function: { name, arguments: args } };
}

export function completion(
  message: { content?: string | null; tool_calls?: ChatCompletionMessageToolCall[] }
): ChatCompletion {
  const full: ChatCompletionMessage = {
    role: "assistant",
    content: message.content ?? null,
    refusal: null,
    tool_calls: message.tool_calls,
  };
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "test-model",
    choices: [{ index: 0, finish_reason: message.tool_calls ? "tool_calls" : "stop", logprobs: null, message: full }],
  };
}

export class FakeChatBackend implements ChatBackend {
  requests: ChatCompletionCreateParamsNonStreaming[] = [];
  private next: ChatCompletion | Error;

  constructor(next: ChatCompletion | Error) {
    this.next = next;
  }

  async complete(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> {
    this.requests.push(params);
    if (this.next instanceof Error) throw this.next;
    return this.next;
  }
}

function slug(name: string): string {
  return name.toLowerCase().replace(/\s+/g, "-");
}

export function track(name: string, artist: string, album = "Test Album"): SpotifyTrack {
  const artistRef = { id: `artist-${slug(artist)}`, name: artist, uri: `spotify:artist:${slug(artist)}` };
  return {
    id: slug(name),
    name,
    uri: `spotify:track:${slug(name)}`,
    duration_ms: 180000,
    artists: [artistRef],
    album: { id: slug(album), name: album, uri: `spotify:album:${slug(album)}`, artists: [artistRef] },
  };
}

export function device(id: string, isActive: boolean, name = `Device ${id}`): SpotifyDevice {
  return { id, name, type: "Computer", is_active: isActive };
}

export class FakeSpotifyApi implements SpotifyWebApi {
  user: SpotifyUser = { id: "user-1", display_name: "Test User" };
  userError: Error | null = null;
  deviceList: SpotifyDevice[] = [device("device-1", true)];
  searchResults: SearchResults = {};
  topTracks: SpotifyTrack[] = [];
  playback: CurrentPlayback | null = null;
  playerError: Error | null = null;

  userCalls = 0;
  deviceCalls = 0;
  searches: { query: string; type: SearchType; limit: number }[] = [];
  commands: { command: string; deviceId: string | null; target?: PlaybackTarget }[] = [];

  async currentUser(): Promise<SpotifyUser> {
    this.userCalls += 1;
    if (this.userError) throw this.userError;
    return this.user;
  }

  async devices(): Promise<SpotifyDevice[]> {
    this.deviceCalls += 1;
    return this.deviceList;
  }

  async search(query: string, type: SearchType, limit: number): Promise<SearchResults> {
    this.searches.push({ query, type, limit });
    return this.searchResults;
  }

  async artistTopTracks(): Promise<SpotifyTrack[]> {
    return this.topTracks;
  }

  private async player(command: string, deviceId: string | null, target?: PlaybackTarget): Promise<void> {
    if (this.playerError) throw this.playerError;
    this.commands.push(target ? { command, deviceId, target } : { command, deviceId });
  }

  startPlayback(deviceId: string | null, target?: PlaybackTarget): Promise<void> {
    return this.player("play", deviceId, target);
  }

  pausePlayback(deviceId: string | null): Promise<void> {
    return this.player("pause", deviceId);
  }

  nextTrack(deviceId: string | null): Promise<void> {
    return this.player("next", deviceId);
  }

  previousTrack(deviceId: string | null): Promise<void> {
    return this.player("previous", deviceId);
  }

  async currentPlayback(): Promise<CurrentPlayback | null> {
    return this.playback;
  }
}

export class FakeMediaControl implements MediaControl {
  calls: unknown[][] = [];
  result: ActionResult = { status: "success", message: "ok" };
  error: Error | null = null;

  private answer(call: unknown[]): Promise<ActionResult> {
    this.calls.push(call);
    if (this.error) return Promise.reject(this.error);
    return Promise.resolve(this.result);
  }

  controlPlayback(action: PlaybackAction): Promise<ActionResult> {
    return this.answer(["controlPlayback", action]);
  }

  searchAndPlay(query: string, type: SearchType): Promise<ActionResult> {
    return this.answer(["searchAndPlay", query, type]);
  }

  getCurrentTrack(): Promise<ActionResult> {
    return this.answer(["getCurrentTrack"]);
  }
}

type ResolveFn = (text: string, context?: ConversationTurn[]) => Promise<ResolvedIntent>;

/** Resolver stand-in that records what it was asked and answers from a script. */
export class ScriptedResolver {
  calls: { text: string; context?: ConversationTurn[] }[] = [];
  private script: ResolveFn;

  constructor(script: ResolveFn) {
    this.script = script;
  }

  resolve(text: string, context?: ConversationTurn[]): Promise<ResolvedIntent> {
    this.calls.push(context ? { text, context } : { text });
    return this.script(text, context);
  }
}
