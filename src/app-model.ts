import type { Action, AppEvent } from "./actions";
import { createInitialState, reduce } from "./app-state";
import type { AppState } from "./app-state";
import { logger } from "./logger";
import type { SpotifyApiClient } from "./spotify-client";

export type AppEventListener = (event: AppEvent) => void;

/**
 * Owns the single application state. Readers get immutable snapshots; the
 * only way to change state is `update`, which runs the reducer and then
 * hands every produced event to the subscribers before returning.
 */
export class AppModel {
  private state: AppState;
  private readonly listeners = new Set<AppEventListener>();

  constructor(
    private readonly spotify: SpotifyApiClient,
    initialState: AppState = createInitialState()
  ) {
    this.state = initialState;
  }

  getState(): AppState {
    return this.state;
  }

  mapStateOpt<T>(project: (state: AppState) => T | null | undefined): T | undefined {
    return project(this.state) ?? undefined;
  }

  getSpotify(): SpotifyApiClient {
    return this.spotify;
  }

  subscribe(listener: AppEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  update(action: Action): AppEvent[] {
    const { state, events } = reduce(this.state, action);
    this.state = state;

    for (const event of events) {
      for (const listener of [...this.listeners]) {
        try {
          listener(event);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error(`Listener failed on ${event.type}: ${message}`);
        }
      }
    }

    return events;
  }
}
