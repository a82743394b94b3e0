import type { ActionDispatcher } from "./dispatcher";
import { escapeMarkup, labels } from "./labels";
import type { SongDescription } from "./types";

const TRACK_LINK_BASE = "https://open.spotify.com/track";

/** What a list row renders for one song. */
export interface SongModel {
  id: string;
  index: number;
  title: string;
  artistLine: string;
  albumName: string;
  duration: string;
  artUrl: string | null;
}

export interface SongAction {
  name: string;
  activate(): void;
}

export type ActionGroup = Map<string, SongAction>;

export interface MenuItem {
  label: string;
  action: string;
}

export type MenuModel = MenuItem[];

export function formatDuration(durationMs: number): string {
  const totalSeconds = Math.floor(Math.max(0, durationMs) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${seconds.toString().padStart(2, "0")}`;
}

export function toSongModel(song: SongDescription, index: number): SongModel {
  return {
    id: song.id,
    index,
    title: song.title,
    artistLine: song.artists.map((artist) => artist.name).join(", "),
    albumName: song.album.name,
    duration: formatDuration(song.durationMs),
    artUrl: song.album.artUrl
  };
}

export function songLink(song: SongDescription): string {
  return `${TRACK_LINK_BASE}/${song.id}`;
}

export function makeArtistActions(song: SongDescription, dispatcher: ActionDispatcher): SongAction[] {
  return song.artists.map((artist) => ({
    name: `view_artist_${artist.id}`,
    activate: () => dispatcher.dispatch({ type: "VIEW_ARTIST", id: artist.id })
  }));
}

export function makeAlbumAction(song: SongDescription, dispatcher: ActionDispatcher): SongAction {
  const albumId = song.album.id;
  return {
    name: "view_album",
    activate: () => dispatcher.dispatch({ type: "VIEW_ALBUM", id: albumId })
  };
}

export function makeLinkAction(song: SongDescription, dispatcher: ActionDispatcher): SongAction {
  const url = songLink(song);
  return {
    name: "copy_link",
    activate: () => dispatcher.dispatch({ type: "COPY_LINK", url })
  };
}

export function songActionGroup(song: SongDescription, dispatcher: ActionDispatcher): ActionGroup {
  const group: ActionGroup = new Map();
  const actions = [
    ...makeArtistActions(song, dispatcher.boxClone()),
    makeAlbumAction(song, dispatcher.boxClone()),
    makeLinkAction(song, dispatcher.boxClone())
  ];

  for (const action of actions) {
    group.set(action.name, action);
  }

  return group;
}

export function songMenu(song: SongDescription): MenuModel {
  const menu: MenuModel = [{ label: labels.VIEW_ALBUM, action: "song.view_album" }];

  for (const artist of song.artists) {
    menu.push({
      label: `${labels.MORE_FROM} ${escapeMarkup(artist.name)}`,
      action: `song.view_artist_${artist.id}`
    });
  }

  menu.push({ label: labels.COPY_LINK, action: "song.copy_link" });
  return menu;
}
