import { EpisodeMetrics, TrainingObserver } from "./types";

export class ConsoleLogger implements TrainingObserver {
  constructor(private readonly every: number = 1) {}

  onEpisodeComplete(episode: number, totalReward: number, metrics: EpisodeMetrics): void {
    if (episode % this.every !== 0) return;
    console.log(
      `Episode ${episode} | Total Reward: ${totalReward.toFixed(2)} | Steps: ${metrics.steps} | ` +
        `Outcome: ${metrics.outcome} | eps=${metrics.epsilon.toFixed(3)}`,
    );
  }
}
