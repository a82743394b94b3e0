import type { Action, AppEvent } from "./actions";
import type { AppModel } from "./app-model";
import { homeState } from "./app-state";
import type { AppState, SelectionState } from "./app-state";
import { DEFAULT_PAGE_SIZE, nextBatch } from "./batch";
import type { ActionDispatcher } from "./dispatcher";
import type { ListDiff } from "./list-diff";
import { logger } from "./logger";
import { defaultHandleToolActivated, handleSelectAllTool } from "./playlist-model";
import type { PlaylistModel, SelectionTool, SelectionToolsModel } from "./playlist-model";
import { songActionGroup, songMenu, toSongModel } from "./song-model";
import type { ActionGroup, MenuModel, SongModel } from "./song-model";
import type { SpotifyApiClient } from "./spotify-client";
import type { SongBatch, SongDescription } from "./types";

export class SavedTracksModel implements PlaylistModel, SelectionToolsModel {
  // Length of the list as last handed to the view, through songs() or a diff.
  private renderedLength = 0;
  private loading = false;
  // Bumped by reload(); a page fetched under an older generation is discarded.
  private generation = 0;

  constructor(
    private readonly appModel: AppModel,
    private readonly actionDispatcher: ActionDispatcher
  ) {}

  private state(): AppState {
    return this.appModel.getState();
  }

  private savedTracks(): readonly SongDescription[] | undefined {
    return this.appModel.mapStateOpt((state) => homeState(state.browser)?.savedTracks);
  }

  private findSong(id: string): SongDescription | undefined {
    return this.savedTracks()?.find((song) => song.id === id);
  }

  private rendered(): SongModel[] | undefined {
    return this.savedTracks()?.map((song, index) => toSongModel(song, index));
  }

  /** Fetches the page after the last one in state. Returns false when there is nothing to fetch. */
  loadMore(): boolean {
    const home = homeState(this.state().browser);
    if (!home || this.loading) {
      return false;
    }

    const batch = nextBatch(home.lastSavedTracksBatch);
    if (!batch) {
      return false;
    }

    this.fetchPage(batch.offset, batch.batchSize, (songBatch) => ({ type: "APPEND_SAVED_TRACKS", batch: songBatch }));
    return true;
  }

  /** Drops everything loaded so far and fetches the first page again. */
  reload(): void {
    const home = homeState(this.state().browser);
    const batchSize = home?.lastSavedTracksBatch.batchSize ?? DEFAULT_PAGE_SIZE;

    // Pages requested before the reload no longer line up with the list.
    this.generation += 1;
    this.fetchPage(0, batchSize, (songBatch) => ({ type: "SET_SAVED_TRACKS", batch: songBatch }));
  }

  private fetchPage(offset: number, batchSize: number, toAction: (songBatch: SongBatch) => Action): void {
    const api = this.appModel.getSpotify();
    const generation = this.generation;

    this.loading = true;
    this.actionDispatcher.callSpotifyAndDispatchMany(async () => {
      try {
        const songBatch = await api.getSavedTracks(offset, batchSize);
        if (generation !== this.generation) {
          logger.debug(`Dropping stale saved tracks page offset=${offset}.`);
          return [];
        }

        return [toAction(songBatch)];
      } finally {
        if (generation === this.generation) {
          this.loading = false;
        }
      }
    }, "savedTracks");
  }

  songs(): SongModel[] | undefined {
    const songs = this.rendered();
    if (songs) {
      this.renderedLength = songs.length;
    }

    return songs;
  }

  currentSongId(): string | undefined {
    return this.state().playback.currentSongId ?? undefined;
  }

  playSong(id: string): void {
    const home = homeState(this.state().browser);
    if (home) {
      this.actionDispatcher.dispatch({
        type: "LOAD_PAGED_SONGS",
        source: { kind: "savedTracks" },
        batch: { batch: home.lastSavedTracksBatch, songs: home.savedTracks }
      });
    }

    this.actionDispatcher.dispatch({ type: "LOAD", id });
  }

  diffForEvent(event: AppEvent): ListDiff<SongModel> | undefined {
    if (event.type !== "SAVED_TRACKS_APPENDED" && event.type !== "SAVED_TRACKS_UPDATED") {
      return undefined;
    }

    const songs = this.rendered();
    if (!songs) {
      return undefined;
    }

    const previousLength = this.renderedLength;
    this.renderedLength = songs.length;

    if (event.type === "SAVED_TRACKS_UPDATED") {
      return { kind: "reset", items: songs };
    }

    if (event.startIndex !== previousLength) {
      logger.warn(
        `Saved tracks append started at ${event.startIndex} but ${previousLength} rows were rendered. Resetting list.`
      );
      return { kind: "reset", items: songs };
    }

    return { kind: "append", items: songs.slice(event.startIndex) };
  }

  autoscrollToPlaying(): boolean {
    return true;
  }

  actionsFor(id: string): ActionGroup | undefined {
    const song = this.findSong(id);
    return song ? songActionGroup(song, this.actionDispatcher) : undefined;
  }

  menuFor(id: string): MenuModel | undefined {
    const song = this.findSong(id);
    return song ? songMenu(song) : undefined;
  }

  selectSong(id: string): void {
    if (!this.selection()) {
      return;
    }

    const song = this.findSong(id);
    if (song) {
      this.actionDispatcher.dispatch({ type: "SELECT", songs: [song] });
    }
  }

  deselectSong(id: string): void {
    if (this.selection()) {
      this.actionDispatcher.dispatch({ type: "DESELECT", ids: [id] });
    }
  }

  enableSelection(): boolean {
    this.actionDispatcher.dispatch({ type: "CHANGE_SELECTION_MODE", active: true });
    return true;
  }

  selection(): SelectionState | undefined {
    return this.appModel.mapStateOpt((state) => (state.selection.context.kind === "queue" ? state.selection : null));
  }

  dispatcher(): ActionDispatcher {
    return this.actionDispatcher.boxClone();
  }

  spotifyClient(): SpotifyApiClient {
    return this.appModel.getSpotify();
  }

  toolsVisible(_selection: SelectionState): SelectionTool[] {
    return [{ kind: "simple", tool: "selectAll" }];
  }

  handleToolActivated(selection: SelectionState, tool: SelectionTool): void {
    if (tool.kind === "simple" && tool.tool === "selectAll") {
      const songs = this.savedTracks();
      if (songs) {
        handleSelectAllTool(this.actionDispatcher, selection, songs);
      }
      return;
    }

    defaultHandleToolActivated(this, selection, tool);
  }
}
