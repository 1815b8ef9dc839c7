import { EpisodeOutcome } from "../types";
import { EpisodeMetrics, TrainingObserver } from "./types";

export class MetricsCollector implements TrainingObserver {
  private history: EpisodeMetrics[] = [];

  onEpisodeComplete(_episode: number, _totalReward: number, metrics: EpisodeMetrics): void {
    this.history.push(metrics);
  }

  getHistory(): readonly EpisodeMetrics[] {
    return this.history;
  }

  /** Mean reward over the last `window` episodes (0 when empty). */
  averageReward(window: number = 10): number {
    const tail = this.history.slice(-window);
    if (tail.length === 0) return 0;
    return tail.reduce((s, h) => s + h.totalReward, 0) / tail.length;
  }

  /** Fraction of the last `window` episodes that reached the goal. */
  successRate(window: number = 10): number {
    const tail = this.history.slice(-window);
    if (tail.length === 0) return 0;
    return tail.filter((h) => h.outcome === "goal").length / tail.length;
  }

  outcomeCounts(): Record<EpisodeOutcome, number> {
    const counts: Record<EpisodeOutcome, number> = {
      goal: 0,
      wall: 0,
      obstacle: 0,
      timeout: 0,
      stopped: 0,
    };
    for (const h of this.history) counts[h.outcome]++;
    return counts;
  }

  bestEpisode(): EpisodeMetrics | undefined {
    let best: EpisodeMetrics | undefined;
    for (const h of this.history) {
      if (best === undefined || h.totalReward > best.totalReward) best = h;
    }
    return best;
  }

  printSummary(): void {
    if (this.history.length === 0) return;
    const best = this.bestEpisode();
    const counts = this.outcomeCounts();

    console.log("\n=== Training Summary ===");
    console.log(`Average Reward (last 10 episodes): ${this.averageReward(10).toFixed(2)}`);
    console.log(`Success Rate (last 10 episodes): ${(100 * this.successRate(10)).toFixed(0)}%`);
    if (best) console.log(`Best Episode: ${best.episode} (${best.totalReward.toFixed(2)})`);
    console.log(
      `Outcomes: goal=${counts.goal} wall=${counts.wall} obstacle=${counts.obstacle} ` +
        `timeout=${counts.timeout} stopped=${counts.stopped}`,
    );
    console.log(`Total Episodes: ${this.history.length}`);
  }
}
