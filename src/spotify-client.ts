import { cursorForPage } from "./batch";
import { logger } from "./logger";
import type { PagingResponse, SavedTrackItem, SongBatch, SongDescription, SpotifyTrack } from "./types";

const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
const SPOTIFY_ACCOUNTS_BASE = "https://accounts.spotify.com/api";
const MAX_RETRIES = 4;
const REQUEST_TIMEOUT_MS = 30000;
// Refresh the access token this long before Spotify says it expires.
const TOKEN_EXPIRY_MARGIN_MS = 60000;

/** The part of the Web API the state core calls into. Safe to share between models. */
export interface SpotifyApiClient {
  getSavedTracks(offset: number, limit: number): Promise<SongBatch>;
  addToPlaylist(playlistId: string, uris: readonly string[]): Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseRetryAfterMs(headerValue: string | null): number | null {
  if (!headerValue) {
    return null;
  }

  const seconds = Number(headerValue);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return null;
  }

  return seconds * 1000;
}

function buildErrorMessage(status: number, bodyText: string): string {
  if (!bodyText) {
    return `Spotify API request failed with status ${status}`;
  }

  try {
    const parsed = JSON.parse(bodyText) as { error?: { message?: string } | string; message?: string };

    if (typeof parsed.error === "string") {
      return `Spotify API request failed with status ${status}: ${parsed.error}`;
    }

    const errorMessage = parsed.error?.message || parsed.message;
    if (errorMessage) {
      return `Spotify API request failed with status ${status}: ${errorMessage}`;
    }
  } catch {
    // Not JSON; fall through to the raw body.
  }

  return `Spotify API request failed with status ${status}: ${bodyText}`;
}

export class SpotifyApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "SpotifyApiError";
    this.status = status;
  }
}

export function toSongDescription(track: SpotifyTrack): SongDescription | null {
  if (!track.id || track.is_local === true) {
    return null;
  }

  return {
    id: track.id,
    uri: track.uri,
    title: track.name,
    artists: track.artists.map((artist) => ({ id: artist.id, name: artist.name })),
    album: {
      id: track.album.id,
      name: track.album.name,
      artUrl: track.album.images?.[0]?.url ?? null
    },
    durationMs: track.duration_ms
  };
}

export function toSongBatch(page: PagingResponse<SavedTrackItem>, offset: number, limit: number): SongBatch {
  const songs: SongDescription[] = [];
  for (const item of page.items) {
    const song = item.track ? toSongDescription(item.track) : null;
    if (song) {
      songs.push(song);
    }
  }

  return {
    batch: cursorForPage(offset, limit, page.items.length, page.total),
    songs
  };
}

interface RequestOptions {
  method?: "GET" | "POST" | "PUT";
  body?: unknown;
  accessToken?: string;
}

// Everything fetch needs except the abort signal, which is made per attempt.
type SendInit = Omit<RequestInit, "signal">;

interface CachedToken {
  value: string;
  expiresAt: number;
}

export class SpotifyClient implements SpotifyApiClient {
  private token: CachedToken | null = null;

  constructor(
    private readonly clientId: string,
    private readonly clientSecret: string,
    private readonly refreshToken: string
  ) {}

  async getSavedTracks(offset: number, limit: number): Promise<SongBatch> {
    const accessToken = await this.accessToken();
    const page = await this.request<PagingResponse<SavedTrackItem>>(
      `${SPOTIFY_API_BASE}/me/tracks?limit=${limit}&offset=${offset}`,
      {
        method: "GET",
        accessToken
      }
    );

    logger.info(`Fetched saved tracks page offset=${page.offset} items=${page.items.length} total=${page.total}`);

    return toSongBatch(page, offset, limit);
  }

  async addToPlaylist(playlistId: string, uris: readonly string[]): Promise<void> {
    const accessToken = await this.accessToken();
    await this.requestText(`${SPOTIFY_API_BASE}/playlists/${playlistId}/items`, {
      method: "POST",
      body: { uris },
      accessToken
    });
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const { accessToken, expiresInSeconds } = await this.refreshAccessToken();
    this.token = {
      value: accessToken,
      expiresAt: Date.now() + expiresInSeconds * 1000 - TOKEN_EXPIRY_MARGIN_MS
    };

    return accessToken;
  }

  async refreshAccessToken(): Promise<{ accessToken: string; expiresInSeconds: number }> {
    const bodyText = await this.send(
      `${SPOTIFY_ACCOUNTS_BASE}/token`,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded"
        },
        body: new URLSearchParams({
          grant_type: "refresh_token",
          refresh_token: this.refreshToken,
          client_id: this.clientId,
          client_secret: this.clientSecret
        })
      },
      "Spotify token request"
    );

    const parsed = JSON.parse(bodyText) as { access_token?: string; expires_in?: number };
    if (!parsed.access_token) {
      throw new Error("Spotify token response did not include access_token");
    }

    return { accessToken: parsed.access_token, expiresInSeconds: parsed.expires_in ?? 3600 };
  }

  private async request<T>(url: string, options: RequestOptions): Promise<T> {
    const bodyText = await this.requestText(url, options);
    return JSON.parse(bodyText) as T;
  }

  private requestText(url: string, options: RequestOptions): Promise<string> {
    const headers: Record<string, string> = {
      Accept: "application/json"
    };

    if (options.accessToken) {
      headers.Authorization = `Bearer ${options.accessToken}`;
    }

    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    return this.send(
      url,
      {
        method: options.method || "GET",
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined
      },
      "Spotify API request"
    );
  }

  /**
   * Fetches with a timeout per attempt and retries timeouts, 429s and 5xx
   * responses with exponential backoff (or the server's Retry-After).
   * Resolves with the response body of the first successful attempt.
   */
  private async send(url: string, init: SendInit, label: string): Promise<string> {
    let attempt = 0;

    while (true) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

      logger.debug(`${label} attempt ${attempt + 1}: ${init.method || "GET"} ${url}`);

      let response: Response;
      try {
        response = await fetch(url, { ...init, signal: controller.signal });
      } catch (error) {
        const isAbortError = error instanceof Error && error.name === "AbortError";
        if (isAbortError && attempt < MAX_RETRIES) {
          attempt += 1;
          logger.warn(`${label} timed out after ${REQUEST_TIMEOUT_MS}ms. Retrying attempt ${attempt}.`);
          await sleep(500 * 2 ** (attempt - 1));
          continue;
        }

        throw error;
      } finally {
        clearTimeout(timeoutId);
      }

      const bodyText = await response.text();
      if (response.ok) {
        return bodyText;
      }

      const shouldRetry = response.status === 429 || response.status >= 500;
      if (shouldRetry && attempt < MAX_RETRIES) {
        attempt += 1;
        const retryAfterMs = parseRetryAfterMs(response.headers.get("retry-after"));
        const backoffMs = retryAfterMs ?? 500 * 2 ** (attempt - 1);
        logger.warn(`${label} got ${response.status}. Retrying attempt ${attempt} in ${backoffMs}ms.`);
        await sleep(backoffMs);
        continue;
      }

      throw new SpotifyApiError(response.status, buildErrorMessage(response.status, bodyText));
    }
  }
}
