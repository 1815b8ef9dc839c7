import { EpisodeMetrics, TrainingObserver } from "./types";

export class DiagnosticLogger implements TrainingObserver {
  constructor(private readonly every: number = 1) {}

  onEpisodeComplete(episode: number, totalReward: number, metrics: EpisodeMetrics): void {
    if (episode % this.every !== 0) return;
    const explorePct =
      metrics.steps > 0 ? ((100 * metrics.explorationSteps) / metrics.steps).toFixed(1) : "0.0";
    console.log(`Episode ${episode}${metrics.isEvaluation ? " (greedy)" : ""}:`);
    console.log(`  - Exploration Rate (epsilon): ${metrics.epsilon.toFixed(4)}`);
    console.log(`  - Q-Table States: ${metrics.qTableSize}`);
    console.log(`  - Exploratory Steps: ${metrics.explorationSteps}/${metrics.steps} (${explorePct}%)`);
    console.log(`  - Distinct Cells Visited: ${metrics.uniqueCells}`);
    console.log(`  - Ended By: ${metrics.outcome}`);
    console.log(`  - Total Reward: ${totalReward.toFixed(2)}`);
  }
}
