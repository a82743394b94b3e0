import type { Action } from "../src/actions";
import { AppModel } from "../src/app-model";
import { AppDispatcher } from "../src/dispatcher";
import type { ActionDispatcher, SpotifyJob, SpotifyManyJob } from "../src/dispatcher";
import { cursorForPage } from "../src/batch";
import type { SpotifyApiClient } from "../src/spotify-client";
import type { SongBatch, SongDescription } from "../src/types";

export function song(id: string, artistNames: string[] = [`Artist ${id}`]): SongDescription {
  return {
    id,
    uri: `spotify:track:${id}`,
    title: `Song ${id}`,
    artists: artistNames.map((name, index) => ({ id: `${id}-artist-${index}`, name })),
    album: { id: `${id}-album`, name: `Album ${id}`, artUrl: null },
    durationMs: 180000
  };
}

export function songs(...ids: string[]): SongDescription[] {
  return ids.map((id) => song(id));
}

/** Serves pages out of an in-memory library the way the saved tracks endpoint would. */
export class FakeSpotifyClient implements SpotifyApiClient {
  readonly pageRequests: Array<{ offset: number; limit: number }> = [];
  readonly playlistWrites: Array<{ playlistId: string; uris: string[] }> = [];
  failures: Error[] = [];

  constructor(private readonly library: SongDescription[] = []) {}

  async getSavedTracks(offset: number, limit: number): Promise<SongBatch> {
    this.pageRequests.push({ offset, limit });
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }

    const page = this.library.slice(offset, offset + limit);
    return { batch: cursorForPage(offset, limit, page.length, this.library.length), songs: page };
  }

  async addToPlaylist(playlistId: string, uris: readonly string[]): Promise<void> {
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }

    this.playlistWrites.push({ playlistId, uris: [...uris] });
  }
}

/** Forwards to a real dispatcher and records every synchronous dispatch, across clones. */
export class RecordingDispatcher implements ActionDispatcher {
  constructor(
    private readonly inner: ActionDispatcher,
    readonly dispatched: Action[] = []
  ) {}

  dispatch(action: Action): void {
    this.dispatched.push(action);
    this.inner.dispatch(action);
  }

  dispatchMany(actions: Action[]): void {
    for (const action of actions) {
      this.dispatch(action);
    }
  }

  callSpotifyAndDispatch(job: SpotifyJob, source?: string): void {
    this.inner.callSpotifyAndDispatch(job, source);
  }

  callSpotifyAndDispatchMany(job: SpotifyManyJob, source?: string): void {
    this.inner.callSpotifyAndDispatchMany(job, source);
  }

  boxClone(): ActionDispatcher {
    return new RecordingDispatcher(this.inner.boxClone(), this.dispatched);
  }
}

export function createHarness(library: SongDescription[] = []) {
  const spotify = new FakeSpotifyClient(library);
  const appModel = new AppModel(spotify);
  const dispatcher = new AppDispatcher(appModel);
  const recorder = new RecordingDispatcher(dispatcher);

  return { spotify, appModel, dispatcher, recorder };
}
