import { GridView } from "../environment/gridWorld";
import { samePosition } from "../types";
import { ProgressSink } from "./types";

export interface ConsoleRendererOptions {
  /** Pause after each frame, for human-paced playback. */
  delayMs?: number;
  /** Overlay pheromone levels on free cells. */
  showPheromone?: boolean;
  /** Clear the terminal before each frame. */
  clearScreen?: boolean;
  /** Ask the caller to stop after this many frames. */
  maxFrames?: number;
  write?: (chunk: string) => void;
}

const CLEAR = "\x1b[2J\x1b[H";

/**
 * Text renderer for a grid world.
 *
 * `#` obstacle, `.` free, `:`/`+` free with light/heavy pheromone,
 * `A` agent, `G` goal.
 */
export class ConsoleRenderer implements ProgressSink {
  private readonly delayMs: number;
  private readonly showPheromone: boolean;
  private readonly clearScreen: boolean;
  private readonly maxFrames: number;
  private readonly write: (chunk: string) => void;
  private frames = 0;
  private stopped = false;

  constructor(
    private readonly env: GridView,
    opts: ConsoleRendererOptions = {},
  ) {
    this.delayMs = opts.delayMs ?? 0;
    this.showPheromone = opts.showPheromone ?? true;
    this.clearScreen = opts.clearScreen ?? false;
    this.maxFrames = opts.maxFrames ?? Infinity;
    this.write = opts.write ?? ((chunk) => process.stdout.write(chunk));
  }

  /** Make the next report answer false. */
  stop(): void {
    this.stopped = true;
  }

  frameCount(): number {
    return this.frames;
  }

  renderGrid(): string[] {
    const lines: string[] = [];
    const pos = this.env.position;
    for (let y = 0; y < this.env.height; y++) {
      let line = "";
      for (let x = 0; x < this.env.width; x++) {
        const here = { x, y };
        if (samePosition(here, pos)) line += "A";
        else if (samePosition(here, this.env.goal)) line += "G";
        else if (this.env.cellAt(x, y) === "obstacle") line += "#";
        else line += this.showPheromone ? shade(this.env.pheromoneAt(x, y)) : ".";
      }
      lines.push(line);
    }
    return lines;
  }

  async report(
    title: string,
    subtitle?: string,
    lines: readonly string[] = [],
  ): Promise<boolean> {
    if (this.stopped) return false;
    const out: string[] = [title];
    if (subtitle) out.push(subtitle);
    out.push(...this.renderGrid(), ...lines);
    this.write((this.clearScreen ? CLEAR : "") + out.join("\n") + "\n");
    this.frames++;

    if (this.delayMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.delayMs));
    }
    return !this.stopped && this.frames < this.maxFrames;
  }

  close(): void {
    this.write("\n");
  }
}

function shade(p: number): string {
  if (p < 0.1) return ".";
  if (p < 0.5) return ":";
  return "+";
}
