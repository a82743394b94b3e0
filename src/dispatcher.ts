import { describeAction } from "./actions";
import type { Action } from "./actions";
import type { AppModel } from "./app-model";
import { logger } from "./logger";

export type SpotifyJob = () => Promise<Action>;
export type SpotifyManyJob = () => Promise<Action[]>;

export interface ActionDispatcher {
  dispatch(action: Action): void;
  dispatchMany(actions: Action[]): void;
  callSpotifyAndDispatch(job: SpotifyJob, source?: string): void;
  callSpotifyAndDispatchMany(job: SpotifyManyJob, source?: string): void;
  boxClone(): ActionDispatcher;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Shared between every handle cloned from the same dispatcher.
export interface DispatchLoop {
  queue: Action[];
  running: boolean;
  pending: Set<Promise<void>>;
}

export class AppDispatcher implements ActionDispatcher {
  private readonly loop: DispatchLoop;

  constructor(
    private readonly model: AppModel,
    loop?: DispatchLoop
  ) {
    this.loop = loop ?? { queue: [], running: false, pending: new Set() };
  }

  dispatch(action: Action): void {
    this.loop.queue.push(action);
    if (this.loop.running) {
      // A listener dispatched while events were being delivered; the outer
      // call drains the queue once the current action has settled.
      return;
    }

    this.loop.running = true;
    try {
      let next = this.loop.queue.shift();
      while (next) {
        logger.debug(`Dispatching ${describeAction(next)}`);
        this.model.update(next);
        next = this.loop.queue.shift();
      }
    } finally {
      this.loop.running = false;
    }
  }

  dispatchMany(actions: Action[]): void {
    for (const action of actions) {
      this.dispatch(action);
    }
  }

  callSpotifyAndDispatch(job: SpotifyJob, source = "spotify"): void {
    this.callSpotifyAndDispatchMany(async () => [await job()], source);
  }

  callSpotifyAndDispatchMany(job: SpotifyManyJob, source = "spotify"): void {
    const task = Promise.resolve()
      .then(job)
      .then(
        (actions) => this.dispatchMany(actions),
        (error: unknown) => {
          const message = describeError(error);
          logger.warn(`Spotify call failed (${source}): ${message}`);
          this.dispatch({ type: "FETCH_FAILED", source, message });
        }
      )
      .finally(() => {
        this.loop.pending.delete(task);
      });

    this.loop.pending.add(task);
  }

  boxClone(): ActionDispatcher {
    return new AppDispatcher(this.model, this.loop);
  }

  /** Resolves once every job started through this dispatcher or its clones has been dispatched. */
  async settled(): Promise<void> {
    while (this.loop.pending.size > 0) {
      await Promise.all([...this.loop.pending]);
    }
  }
}
