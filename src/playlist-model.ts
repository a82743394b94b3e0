import type { AppEvent } from "./actions";
import { selectedSongs } from "./app-state";
import type { SelectionState } from "./app-state";
import type { ActionDispatcher } from "./dispatcher";
import { labels } from "./labels";
import type { ListDiff } from "./list-diff";
import { logger } from "./logger";
import type { ActionGroup, MenuModel, SongModel } from "./song-model";
import type { SpotifyApiClient } from "./spotify-client";
import type { PlaylistRef, SongDescription } from "./types";

/** A song list as a view sees it. Accessors return undefined rather than throw when state is missing. */
export interface PlaylistModel {
  songs(): SongModel[] | undefined;
  currentSongId(): string | undefined;
  playSong(id: string): void;
  diffForEvent(event: AppEvent): ListDiff<SongModel> | undefined;
  autoscrollToPlaying(): boolean;
  actionsFor(id: string): ActionGroup | undefined;
  menuFor(id: string): MenuModel | undefined;
  selectSong(id: string): void;
  deselectSong(id: string): void;
  enableSelection(): boolean;
  selection(): SelectionState | undefined;
}

export type SimpleSelectionTool = "selectAll" | "moveUp" | "moveDown" | "remove";

export type AddSelectionTool = { kind: "addToQueue" } | { kind: "addToPlaylist"; playlist: PlaylistRef };

export type SelectionTool = { kind: "simple"; tool: SimpleSelectionTool } | { kind: "add"; tool: AddSelectionTool };

export interface SelectionToolsModel {
  dispatcher(): ActionDispatcher;
  spotifyClient(): SpotifyApiClient;
  selection(): SelectionState | undefined;
  toolsVisible(selection: SelectionState): SelectionTool[];
  handleToolActivated(selection: SelectionState, tool: SelectionTool): void;
}

export function handleSelectAllTool(
  dispatcher: ActionDispatcher,
  selection: SelectionState,
  songs: readonly SongDescription[]
): void {
  const missing = songs.filter((song) => !selection.selected.has(song.id));
  if (missing.length > 0) {
    dispatcher.dispatch({ type: "SELECT", songs: missing });
  }
}

export function defaultHandleToolActivated(
  model: SelectionToolsModel,
  selection: SelectionState,
  tool: SelectionTool
): void {
  if (tool.kind !== "add") {
    logger.debug(`Selection tool ${tool.tool} has no default handler.`);
    return;
  }

  const songs = selectedSongs(selection);
  const addTool = tool.tool;

  switch (addTool.kind) {
    case "addToQueue":
      model.dispatcher().dispatchMany([
        { type: "QUEUE", songs },
        { type: "CHANGE_SELECTION_MODE", active: false }
      ]);
      return;

    case "addToPlaylist": {
      const api = model.spotifyClient();
      const { playlist } = addTool;
      const uris = songs.map((song) => song.uri);

      model.dispatcher().callSpotifyAndDispatchMany(async () => {
        await api.addToPlaylist(playlist.id, uris);
        return [
          { type: "SHOW_NOTIFICATION", message: labels.addedToPlaylist(uris.length, playlist.name) },
          { type: "CHANGE_SELECTION_MODE", active: false }
        ];
      }, "addToPlaylist");
      return;
    }
  }
}
