import { sameContext } from "./actions";
import type {
  Action,
  AppEvent,
  BrowserAction,
  PlaybackAction,
  PlaylistSource,
  Screen,
  SelectionAction,
  SelectionContext
} from "./actions";
import { emptySongBatch } from "./batch";
import type { PaginationCursor, SongDescription } from "./types";

export interface HomeState {
  readonly savedTracks: readonly SongDescription[];
  /** Cursor of the most recently fetched page; the next page derives from it. */
  readonly lastSavedTracksBatch: PaginationCursor;
}

export interface BrowserState {
  readonly home: HomeState | null;
  readonly navigation: readonly Screen[];
}

export interface PlaybackState {
  readonly currentSongId: string | null;
  readonly source: PlaylistSource | null;
  readonly queue: readonly SongDescription[];
  readonly batch: PaginationCursor | null;
  readonly isPlaying: boolean;
}

export interface SelectionState {
  readonly active: boolean;
  readonly context: SelectionContext;
  readonly selected: ReadonlyMap<string, SongDescription>;
}

export interface AppState {
  readonly browser: BrowserState;
  readonly playback: PlaybackState;
  readonly selection: SelectionState;
}

export interface Reduction {
  state: AppState;
  events: AppEvent[];
}

export function createInitialState(): AppState {
  return {
    browser: { home: null, navigation: [{ kind: "home" }] },
    playback: { currentSongId: null, source: null, queue: [], batch: null, isPlaying: false },
    selection: { active: false, context: { kind: "queue" }, selected: new Map<string, SongDescription>() }
  };
}

export function homeState(browser: BrowserState): HomeState | null {
  return browser.home;
}

export function selectedSongs(selection: SelectionState): SongDescription[] {
  return [...selection.selected.values()];
}

function unchanged(state: AppState): Reduction {
  return { state, events: [] };
}

function reduceBrowser(state: AppState, action: BrowserAction): Reduction {
  const browser = state.browser;

  switch (action.type) {
    case "INIT_HOME": {
      if (browser.home) {
        return unchanged(state);
      }

      const empty = emptySongBatch(action.batchSize);
      return {
        state: { ...state, browser: { ...browser, home: { savedTracks: [], lastSavedTracksBatch: empty.batch } } },
        events: [{ type: "HOME_INITIALIZED" }]
      };
    }

    case "SET_SAVED_TRACKS":
      return {
        state: {
          ...state,
          browser: { ...browser, home: { savedTracks: [...action.batch.songs], lastSavedTracksBatch: action.batch.batch } }
        },
        events: [{ type: "SAVED_TRACKS_UPDATED" }]
      };

    case "APPEND_SAVED_TRACKS": {
      const home = browser.home;
      if (!home) {
        return unchanged(state);
      }

      const startIndex = home.savedTracks.length;
      return {
        state: {
          ...state,
          browser: {
            ...browser,
            home: {
              savedTracks: [...home.savedTracks, ...action.batch.songs],
              lastSavedTracksBatch: action.batch.batch
            }
          }
        },
        events: [{ type: "SAVED_TRACKS_APPENDED", startIndex }]
      };
    }

    case "NAVIGATE_BACK":
      if (browser.navigation.length <= 1) {
        return unchanged(state);
      }

      return {
        state: { ...state, browser: { ...browser, navigation: browser.navigation.slice(0, -1) } },
        events: [{ type: "NAVIGATION_POPPED" }]
      };
  }
}

function pushScreen(state: AppState, screen: Screen): Reduction {
  return {
    state: { ...state, browser: { ...state.browser, navigation: [...state.browser.navigation, screen] } },
    events: [{ type: "NAVIGATION_PUSHED", screen }]
  };
}

function reducePlayback(state: AppState, action: PlaybackAction): Reduction {
  const playback = state.playback;

  switch (action.type) {
    case "LOAD_PAGED_SONGS":
      return {
        state: {
          ...state,
          playback: { ...playback, queue: [...action.batch.songs], source: action.source, batch: action.batch.batch }
        },
        events: [{ type: "PLAYLIST_CHANGED" }]
      };

    case "LOAD": {
      if (!playback.queue.some((song) => song.id === action.id)) {
        return unchanged(state);
      }

      const events: AppEvent[] = [{ type: "TRACK_CHANGED", id: action.id }];
      if (!playback.isPlaying) {
        events.push({ type: "PLAYBACK_STATE_CHANGED", isPlaying: true });
      }

      return {
        state: { ...state, playback: { ...playback, currentSongId: action.id, isPlaying: true } },
        events
      };
    }

    case "QUEUE":
      if (action.songs.length === 0) {
        return unchanged(state);
      }

      return {
        state: { ...state, playback: { ...playback, queue: [...playback.queue, ...action.songs] } },
        events: [{ type: "PLAYLIST_CHANGED" }]
      };

    case "TOGGLE_PLAY": {
      if (!playback.currentSongId) {
        return unchanged(state);
      }

      const isPlaying = !playback.isPlaying;
      return {
        state: { ...state, playback: { ...playback, isPlaying } },
        events: [{ type: "PLAYBACK_STATE_CHANGED", isPlaying }]
      };
    }

    case "STOP":
      if (!playback.currentSongId) {
        return unchanged(state);
      }

      return {
        state: { ...state, playback: { ...playback, currentSongId: null, isPlaying: false } },
        events: [{ type: "PLAYBACK_STOPPED" }]
      };
  }
}

function withSelected(state: AppState, selected: Map<string, SongDescription>): Reduction {
  return {
    state: { ...state, selection: { ...state.selection, selected } },
    events: [{ type: "SELECTION_CHANGED" }]
  };
}

function reduceSelection(state: AppState, action: SelectionAction): Reduction {
  const selection = state.selection;

  switch (action.type) {
    case "SELECT": {
      const added = action.songs.filter((song) => !selection.selected.has(song.id));
      if (added.length === 0) {
        return unchanged(state);
      }

      const selected = new Map(selection.selected);
      for (const song of added) {
        selected.set(song.id, song);
      }

      return withSelected(state, selected);
    }

    case "DESELECT": {
      const removed = action.ids.filter((id) => selection.selected.has(id));
      if (removed.length === 0) {
        return unchanged(state);
      }

      const selected = new Map(selection.selected);
      for (const id of removed) {
        selected.delete(id);
      }

      return withSelected(state, selected);
    }

    case "CLEAR_SELECTION":
      if (selection.selected.size === 0) {
        return unchanged(state);
      }

      return withSelected(state, new Map<string, SongDescription>());

    case "CHANGE_SELECTION_CONTEXT": {
      if (sameContext(selection.context, action.context)) {
        return unchanged(state);
      }

      // Selections never survive a context switch.
      const events: AppEvent[] = [{ type: "SELECTION_CONTEXT_CHANGED", context: action.context }];
      if (selection.selected.size > 0) {
        events.push({ type: "SELECTION_CHANGED" });
      }

      return {
        state: { ...state, selection: { ...selection, context: action.context, selected: new Map<string, SongDescription>() } },
        events
      };
    }
  }
}

export function reduce(state: AppState, action: Action): Reduction {
  switch (action.type) {
    case "INIT_HOME":
    case "SET_SAVED_TRACKS":
    case "APPEND_SAVED_TRACKS":
    case "NAVIGATE_BACK":
      return reduceBrowser(state, action);

    case "LOAD":
    case "LOAD_PAGED_SONGS":
    case "QUEUE":
    case "TOGGLE_PLAY":
    case "STOP":
      return reducePlayback(state, action);

    case "SELECT":
    case "DESELECT":
    case "CLEAR_SELECTION":
    case "CHANGE_SELECTION_CONTEXT":
      return reduceSelection(state, action);

    case "CHANGE_SELECTION_MODE": {
      const selection = state.selection;
      if (selection.active === action.active) {
        return unchanged(state);
      }

      const events: AppEvent[] = [{ type: "SELECTION_MODE_CHANGED", active: action.active }];
      const selected = action.active ? selection.selected : new Map<string, SongDescription>();
      if (selected.size !== selection.selected.size) {
        events.push({ type: "SELECTION_CHANGED" });
      }

      return { state: { ...state, selection: { ...selection, active: action.active, selected } }, events };
    }

    case "VIEW_ARTIST":
      return pushScreen(state, { kind: "artist", id: action.id });

    case "VIEW_ALBUM":
      return pushScreen(state, { kind: "album", id: action.id });

    case "COPY_LINK":
      return { state, events: [{ type: "LINK_COPY_REQUESTED", url: action.url }] };

    case "SHOW_NOTIFICATION":
      return { state, events: [{ type: "NOTIFICATION_SHOWN", message: action.message }] };

    case "FETCH_FAILED":
      return { state, events: [{ type: "FETCH_FAILED", source: action.source, message: action.message }] };
  }
}
