import type { z } from "zod";
import { createLogger } from "@credscope/logger";
import { DEFAULT_BASE_URL, FetchError, formatError } from "@credscope/core";
import {
  CharacterStatsSchema,
  ConversationDetailSchema,
  ConversationPageSchema,
  HistoryPageSchema,
  UserSchema,
} from "./schemas.js";
import type {
  CharacterStats,
  ConversationDetail,
  ConversationPage,
  HistoryPage,
  UserInfo,
} from "./schemas.js";
import type {
  CharacterStatsRequest,
  ConversationPageRequest,
  HistoryPageRequest,
  UsageProvider,
} from "./types.js";

const log = createLogger("provider:elevenlabs");

type QueryValue = string | number | undefined;

/** Longest response body excerpt carried in an error message */
const MAX_ERROR_BODY = 500;

export class ElevenLabsClient implements UsageProvider {
  readonly name = "elevenlabs";
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(apiKey: string, baseUrl: string = DEFAULT_BASE_URL) {
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  listHistory(request: HistoryPageRequest): Promise<HistoryPage> {
    return this.get(
      "/v1/history",
      {
        page_size: request.pageSize,
        start_after_history_item_id: request.startAfterHistoryItemId,
      },
      HistoryPageSchema,
    );
  }

  listConversations(request: ConversationPageRequest): Promise<ConversationPage> {
    return this.get(
      "/v1/convai/conversations",
      {
        page_size: request.pageSize,
        cursor: request.cursor,
        call_start_after_unix: request.callStartAfterUnix,
        call_start_before_unix: request.callStartBeforeUnix,
      },
      ConversationPageSchema,
    );
  }

  getConversation(conversationId: string): Promise<ConversationDetail> {
    return this.get(
      `/v1/convai/conversations/${encodeURIComponent(conversationId)}`,
      {},
      ConversationDetailSchema,
    );
  }

  getUser(): Promise<UserInfo> {
    return this.get("/v1/user", {}, UserSchema);
  }

  getCharacterStats(request: CharacterStatsRequest): Promise<CharacterStats> {
    return this.get(
      "/v1/usage/character-stats",
      {
        start_unix: request.startUnixMs,
        end_unix: request.endUnixMs,
        breakdown_type: request.breakdownType,
        aggregation_interval: request.aggregationInterval,
        metric: request.metric,
      },
      CharacterStatsSchema,
    );
  }

  /** Build the request URL, leaving out absent query parameters. */
  buildUrl(path: string, query: Record<string, QueryValue>): string {
    const url = new URL(this.baseUrl + path);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async get<S extends z.ZodTypeAny>(
    path: string,
    query: Record<string, QueryValue>,
    schema: S,
  ): Promise<z.infer<S>> {
    const url = this.buildUrl(path, query);
    log.debug(`GET ${path}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: {
          "xi-api-key": this.apiKey,
          Accept: "application/json",
        },
      });
    } catch (err) {
      throw new FetchError(`Request to ${path} failed: ${formatError(err)}`, undefined, err);
    }

    if (!response.ok) {
      const body = (await response.text()).slice(0, MAX_ERROR_BODY);
      const reason =
        response.status === 401 || response.status === 403
          ? "authentication failed"
          : "request failed";
      throw new FetchError(
        `${path} ${reason}: HTTP ${response.status} — ${body}`,
        response.status,
      );
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new FetchError(
        `${path} returned invalid JSON: ${formatError(err)}`,
        response.status,
        err,
      );
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new FetchError(
        `${path} returned an unexpected response: ${parsed.error.message}`,
        response.status,
        parsed.error,
      );
    }
    return parsed.data;
  }
}
