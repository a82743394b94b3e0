import { describe, expect, it } from "vitest";
import type { Action } from "../src/actions";
import { createInitialState, reduce, selectedSongs } from "../src/app-state";
import type { AppState } from "../src/app-state";
import { song, songs } from "./helpers";

function run(state: AppState, ...actions: Action[]): AppState {
  return actions.reduce((current, action) => reduce(current, action).state, state);
}

const withHome = run(createInitialState(), {
  type: "SET_SAVED_TRACKS",
  batch: { batch: { offset: 0, batchSize: 3, total: 5 }, songs: songs("A", "B", "C") }
});

describe("saved tracks", () => {
  it("starts with no home state", () => {
    expect(createInitialState().browser.home).toBeNull();
  });

  it("initializes an empty home once", () => {
    const first = reduce(createInitialState(), { type: "INIT_HOME", batchSize: 20 });

    expect(first.events).toEqual([{ type: "HOME_INITIALIZED" }]);
    expect(first.state.browser.home).toEqual({
      savedTracks: [],
      lastSavedTracksBatch: { offset: 0, batchSize: 20, total: 0 }
    });
    expect(reduce(first.state, { type: "INIT_HOME", batchSize: 20 }).events).toEqual([]);
  });

  it("reports the previous length when appending", () => {
    const result = reduce(withHome, {
      type: "APPEND_SAVED_TRACKS",
      batch: { batch: { offset: 3, batchSize: 3, total: 5 }, songs: songs("D", "E") }
    });

    expect(result.events).toEqual([{ type: "SAVED_TRACKS_APPENDED", startIndex: 3 }]);
    expect(result.state.browser.home?.savedTracks.map((s) => s.id)).toEqual(["A", "B", "C", "D", "E"]);
    expect(result.state.browser.home?.lastSavedTracksBatch).toEqual({ offset: 3, batchSize: 3, total: 5 });
  });

  it("does not deduplicate a repeated append", () => {
    const append: Action = {
      type: "APPEND_SAVED_TRACKS",
      batch: { batch: { offset: 3, batchSize: 3, total: 5 }, songs: songs("D", "E") }
    };

    const state = run(withHome, append, append);

    expect(state.browser.home?.savedTracks).toHaveLength(7);
  });

  it("ignores an append that lands after the home state is gone", () => {
    const state = createInitialState();
    const result = reduce(state, {
      type: "APPEND_SAVED_TRACKS",
      batch: { batch: { offset: 0, batchSize: 3, total: 3 }, songs: songs("A") }
    });

    expect(result.state).toBe(state);
    expect(result.events).toEqual([]);
  });

  it("leaves earlier snapshots untouched", () => {
    const before = withHome.browser.home?.savedTracks;
    run(withHome, {
      type: "APPEND_SAVED_TRACKS",
      batch: { batch: { offset: 3, batchSize: 3, total: 5 }, songs: songs("D") }
    });

    expect(before?.map((s) => s.id)).toEqual(["A", "B", "C"]);
  });

  it("leaves pagination alone when a fetch fails", () => {
    const result = reduce(withHome, { type: "FETCH_FAILED", source: "savedTracks", message: "boom" });

    expect(result.state).toBe(withHome);
    expect(result.events).toEqual([{ type: "FETCH_FAILED", source: "savedTracks", message: "boom" }]);
  });
});

describe("playback", () => {
  it("loads a paged queue then a track from it", () => {
    const queued = reduce(withHome, {
      type: "LOAD_PAGED_SONGS",
      source: { kind: "savedTracks" },
      batch: { batch: { offset: 0, batchSize: 3, total: 5 }, songs: songs("A", "B") }
    });
    const loaded = reduce(queued.state, { type: "LOAD", id: "B" });

    expect(queued.events).toEqual([{ type: "PLAYLIST_CHANGED" }]);
    expect(loaded.events).toEqual([
      { type: "TRACK_CHANGED", id: "B" },
      { type: "PLAYBACK_STATE_CHANGED", isPlaying: true }
    ]);
    expect(loaded.state.playback.currentSongId).toBe("B");
    expect(loaded.state.playback.source).toEqual({ kind: "savedTracks" });
  });

  it("ignores a load for a song outside the queue", () => {
    const result = reduce(withHome, { type: "LOAD", id: "Z" });

    expect(result.state.playback.currentSongId).toBeNull();
    expect(result.events).toEqual([]);
  });

  it("toggles and stops only with a current song", () => {
    expect(reduce(createInitialState(), { type: "TOGGLE_PLAY" }).events).toEqual([]);

    const playing = run(
      createInitialState(),
      { type: "QUEUE", songs: songs("A") },
      { type: "LOAD", id: "A" }
    );
    const paused = reduce(playing, { type: "TOGGLE_PLAY" });
    const stopped = reduce(paused.state, { type: "STOP" });

    expect(paused.events).toEqual([{ type: "PLAYBACK_STATE_CHANGED", isPlaying: false }]);
    expect(stopped.state.playback.currentSongId).toBeNull();
    expect(stopped.events).toEqual([{ type: "PLAYBACK_STOPPED" }]);
  });
});

describe("selection", () => {
  it("selects each song once", () => {
    const first = reduce(createInitialState(), { type: "SELECT", songs: [song("A"), song("B")] });
    const again = reduce(first.state, { type: "SELECT", songs: [song("A")] });

    expect(first.events).toEqual([{ type: "SELECTION_CHANGED" }]);
    expect(again.events).toEqual([]);
    expect(selectedSongs(first.state.selection).map((s) => s.id)).toEqual(["A", "B"]);
  });

  it("deselects by id", () => {
    const state = run(
      createInitialState(),
      { type: "SELECT", songs: songs("A", "B") },
      { type: "DESELECT", ids: ["A", "missing"] }
    );

    expect([...state.selection.selected.keys()]).toEqual(["B"]);
  });

  it("clears the selection when the context changes", () => {
    const selected = run(createInitialState(), { type: "SELECT", songs: songs("A") });
    const switched = reduce(selected, { type: "CHANGE_SELECTION_CONTEXT", context: { kind: "playlist", id: "p1" } });
    const back = reduce(switched.state, { type: "CHANGE_SELECTION_CONTEXT", context: { kind: "queue" } });

    expect(switched.events).toEqual([
      { type: "SELECTION_CONTEXT_CHANGED", context: { kind: "playlist", id: "p1" } },
      { type: "SELECTION_CHANGED" }
    ]);
    expect(back.state.selection.selected.size).toBe(0);
  });

  it("keeps the selection when the same context is set again", () => {
    const selected = run(createInitialState(), { type: "SELECT", songs: songs("A") });
    const result = reduce(selected, { type: "CHANGE_SELECTION_CONTEXT", context: { kind: "queue" } });

    expect(result.state).toBe(selected);
  });

  it("clears the selection when selection mode ends", () => {
    const state = run(
      createInitialState(),
      { type: "CHANGE_SELECTION_MODE", active: true },
      { type: "SELECT", songs: songs("A") }
    );
    const result = reduce(state, { type: "CHANGE_SELECTION_MODE", active: false });

    expect(result.events).toEqual([
      { type: "SELECTION_MODE_CHANGED", active: false },
      { type: "SELECTION_CHANGED" }
    ]);
    expect(result.state.selection.selected.size).toBe(0);
  });
});

describe("navigation", () => {
  it("pushes artist and album screens and pops back to home", () => {
    const pushed = run(createInitialState(), { type: "VIEW_ARTIST", id: "ar1" }, { type: "VIEW_ALBUM", id: "al1" });
    const popped = run(pushed, { type: "NAVIGATE_BACK" }, { type: "NAVIGATE_BACK" }, { type: "NAVIGATE_BACK" });

    expect(pushed.browser.navigation).toEqual([
      { kind: "home" },
      { kind: "artist", id: "ar1" },
      { kind: "album", id: "al1" }
    ]);
    expect(popped.browser.navigation).toEqual([{ kind: "home" }]);
  });
});
