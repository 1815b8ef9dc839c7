import { EpisodeOutcome } from "../types";

/** Per-episode summary handed to training observers. */
export interface EpisodeMetrics {
  episode: number;
  totalReward: number;
  steps: number;
  outcome: EpisodeOutcome;
  /** Epsilon in effect during the episode (before its end-of-episode decay). */
  epsilon: number;
  /** Number of states with a Q-table row. */
  qTableSize: number;
  explorationSteps: number;
  uniqueCells: number;
  isEvaluation: boolean;
}

/** Interface for training observers to receive episode-level callbacks. */
export interface TrainingObserver {
  /** Called after each episode with its scalar reward and metrics. */
  onEpisodeComplete(episode: number, totalReward: number, metrics: EpisodeMetrics): void;
}

/**
 * Step-level progress sink, e.g. a renderer.
 *
 * `report` answers whether the run should keep going; it may block (a paused
 * UI) or delay (human-paced playback). Returning false stops the current
 * training or rollout call, which then returns its partial result.
 */
export interface ProgressSink {
  report(
    title: string,
    subtitle?: string,
    lines?: readonly string[],
  ): boolean | Promise<boolean>;
  close?(): void | Promise<void>;
}
