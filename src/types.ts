export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [P in keyof T]: DeepReadonly<T[P]> }
    : T;

export interface ArtistRef {
  id: string;
  name: string;
}

export interface AlbumRef {
  id: string;
  name: string;
  artUrl: string | null;
}

export type SongDescription = DeepReadonly<{
  id: string;
  uri: string;
  title: string;
  artists: ArtistRef[];
  album: AlbumRef;
  durationMs: number;
}>;

export interface PaginationCursor {
  readonly offset: number;
  readonly batchSize: number;
  /** Null until the server (or a short page) tells us where the list ends. */
  readonly total: number | null;
}

export interface SongBatch {
  readonly batch: PaginationCursor;
  readonly songs: readonly SongDescription[];
}

export interface PlaylistRef {
  id: string;
  name: string;
}

// Web API payloads

export interface SpotifyArtist {
  id: string;
  name: string;
}

export interface SpotifyImage {
  url: string;
  width?: number | null;
  height?: number | null;
}

export interface SpotifyAlbum {
  id: string;
  name: string;
  images?: SpotifyImage[];
}

export interface SpotifyTrack {
  id: string | null;
  uri: string;
  name: string;
  duration_ms: number;
  artists: SpotifyArtist[];
  album: SpotifyAlbum;
  is_local?: boolean;
}

export interface SavedTrackItem {
  added_at: string;
  track: SpotifyTrack | null;
}

export interface PagingResponse<T> {
  items: T[];
  limit: number;
  offset: number;
  total: number;
  next: string | null;
}
