import { AppModel } from "./app-model";
import { loadConfig } from "./config";
import { AppDispatcher } from "./dispatcher";
import { applyListDiff } from "./list-diff";
import { logger, setLogLevel } from "./logger";
import { SavedTracksModel } from "./saved-tracks-model";
import type { SongModel } from "./song-model";
import { SpotifyClient } from "./spotify-client";

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const spotifyClient = new SpotifyClient(
    config.spotifyClientId,
    config.spotifyClientSecret,
    config.spotifyRefreshToken
  );

  const appModel = new AppModel(spotifyClient);
  const dispatcher = new AppDispatcher(appModel);
  const savedTracks = new SavedTracksModel(appModel, dispatcher.boxClone());

  let rows: SongModel[] = [];
  let pages = 0;
  const failures: string[] = [];

  appModel.subscribe((event) => {
    if (event.type === "FETCH_FAILED") {
      failures.push(event.message);
      return;
    }

    const diff = savedTracks.diffForEvent(event);
    if (!diff) {
      return;
    }

    rows = applyListDiff(rows, diff, (row) => row.id);
    pages += 1;
    logger.info(`Rendered ${diff.kind} rows=${rows.length}`);
    savedTracks.loadMore();
  });

  dispatcher.dispatch({ type: "INIT_HOME", batchSize: config.savedTracksPageSize });
  savedTracks.reload();
  await dispatcher.settled();

  if (failures.length > 0) {
    throw new Error(failures.join("; "));
  }

  logger.info(`Loaded saved tracks. count=${rows.length} pages=${pages}`);
  for (const row of rows.slice(0, 10)) {
    logger.info(`${row.index + 1}. ${row.title} - ${row.artistLine} (${row.duration})`);
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`Run failed: ${message}`);
  process.exitCode = 1;
});
