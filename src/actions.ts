import type { SongBatch, SongDescription } from "./types";

export type PlaylistSource = { kind: "savedTracks" } | { kind: "playlist"; id: string } | { kind: "album"; id: string };

export type SelectionContext =
  | { kind: "queue" }
  | { kind: "playlist"; id: string }
  | { kind: "editablePlaylist"; id: string };

export type Screen = { kind: "home" } | { kind: "artist"; id: string } | { kind: "album"; id: string };

export type BrowserAction =
  | { type: "INIT_HOME"; batchSize: number }
  | { type: "SET_SAVED_TRACKS"; batch: SongBatch }
  | { type: "APPEND_SAVED_TRACKS"; batch: SongBatch }
  | { type: "NAVIGATE_BACK" };

export type PlaybackAction =
  | { type: "LOAD"; id: string }
  | { type: "LOAD_PAGED_SONGS"; source: PlaylistSource | null; batch: SongBatch }
  | { type: "QUEUE"; songs: readonly SongDescription[] }
  | { type: "TOGGLE_PLAY" }
  | { type: "STOP" };

export type SelectionAction =
  | { type: "SELECT"; songs: readonly SongDescription[] }
  | { type: "DESELECT"; ids: readonly string[] }
  | { type: "CLEAR_SELECTION" }
  | { type: "CHANGE_SELECTION_CONTEXT"; context: SelectionContext };

export type AppAction =
  | { type: "CHANGE_SELECTION_MODE"; active: boolean }
  | { type: "VIEW_ARTIST"; id: string }
  | { type: "VIEW_ALBUM"; id: string }
  | { type: "COPY_LINK"; url: string }
  | { type: "SHOW_NOTIFICATION"; message: string }
  | { type: "FETCH_FAILED"; source: string; message: string };

export type Action = BrowserAction | PlaybackAction | SelectionAction | AppAction;

export type BrowserEvent =
  | { type: "HOME_INITIALIZED" }
  | { type: "SAVED_TRACKS_UPDATED" }
  /** startIndex is the list length before the append. */
  | { type: "SAVED_TRACKS_APPENDED"; startIndex: number }
  | { type: "NAVIGATION_PUSHED"; screen: Screen }
  | { type: "NAVIGATION_POPPED" };

export type PlaybackEvent =
  | { type: "TRACK_CHANGED"; id: string }
  | { type: "PLAYLIST_CHANGED" }
  | { type: "PLAYBACK_STATE_CHANGED"; isPlaying: boolean }
  | { type: "PLAYBACK_STOPPED" };

export type SelectionEvent =
  | { type: "SELECTION_CHANGED" }
  | { type: "SELECTION_MODE_CHANGED"; active: boolean }
  | { type: "SELECTION_CONTEXT_CHANGED"; context: SelectionContext };

export type AppEvent =
  | BrowserEvent
  | PlaybackEvent
  | SelectionEvent
  | { type: "LINK_COPY_REQUESTED"; url: string }
  | { type: "NOTIFICATION_SHOWN"; message: string }
  | { type: "FETCH_FAILED"; source: string; message: string };

export function sameContext(a: SelectionContext, b: SelectionContext): boolean {
  if (a.kind === "queue" || b.kind === "queue") {
    return a.kind === b.kind;
  }

  return a.kind === b.kind && a.id === b.id;
}

export function describeAction(action: Action): string {
  switch (action.type) {
    case "SET_SAVED_TRACKS":
    case "APPEND_SAVED_TRACKS":
    case "LOAD_PAGED_SONGS":
      return `${action.type} offset=${action.batch.batch.offset} songs=${action.batch.songs.length}`;
    case "QUEUE":
    case "SELECT":
      return `${action.type} songs=${action.songs.length}`;
    case "DESELECT":
      return `${action.type} ids=${action.ids.length}`;
    case "LOAD":
    case "VIEW_ARTIST":
    case "VIEW_ALBUM":
      return `${action.type} id=${action.id}`;
    default:
      return action.type;
  }
}
