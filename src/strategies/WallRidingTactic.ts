import { DEFAULT_WALL_RIDING } from "../config/defaults";
import { ISignal, ITactic, ITacticContext, IWallRidingOptions } from "../types/strategy.types";
import { logger } from "../utils/logger";
import { createSignal } from "./createSignal";

export interface IWallObservation {
  price: number;
  depth: number;
  firstSeen: number;
  lastSeen: number;
}

/**
 * Tracks large resting bids. A wall that has stood for `persistenceMs` is
 * treated as real support, and the tactic bids one tick above it.
 */
export class WallRidingTactic implements ITactic {
  readonly kind = "wall_riding" as const;
  private options: IWallRidingOptions;
  private walls: Map<string, Map<number, IWallObservation>> = new Map();

  constructor(options: Partial<IWallRidingOptions> = {}) {
    this.options = { ...DEFAULT_WALL_RIDING, ...options };
  }

  onMarketData(): ISignal[] {
    return [];
  }

  onTrade(): ISignal[] {
    return [];
  }

  onOrderBook(ctx: ITacticContext): ISignal[] {
    const { instrument, now } = ctx;
    let walls = this.walls.get(instrument);
    if (!walls) {
      walls = new Map();
      this.walls.set(instrument, walls);
    }

    for (const level of ctx.book.getBids(this.options.scanLevels)) {
      if (level.size < this.options.wallDepthThreshold) continue;
      const seen = walls.get(level.price);
      if (seen) {
        seen.lastSeen = now;
        seen.depth = level.size;
      } else {
        walls.set(level.price, { price: level.price, depth: level.size, firstSeen: now, lastSeen: now });
        logger.info(`[WallRide] ${instrument} wall @ ${level.price} depth=${level.size}`);
      }
    }

    for (const [price, wall] of walls) {
      if (now - wall.lastSeen > this.options.absenceGraceMs) {
        walls.delete(price);
        logger.info(`[WallRide] ${instrument} wall @ ${price} gone`);
      }
    }

    const wall = this.trustedWall(instrument, now);
    if (!wall) return [];

    const age = now - wall.firstSeen;
    return [
      createSignal({
        strategy: this.kind,
        instrument,
        action: "buy",
        orderType: "limit",
        price: wall.price + this.options.tickSize,
        size: this.options.positionSize,
        confidence: this.options.confidence,
        reason: `wall ${wall.depth} @ ${wall.price} held ${(age / 1000).toFixed(1)}s`,
        timestamp: now,
      }),
    ];
  }

  /** Highest currently visible wall whose age has reached the persistence threshold. */
  trustedWall(instrument: string, now: number): IWallObservation | null {
    const walls = this.walls.get(instrument);
    if (!walls) return null;
    let best: IWallObservation | null = null;
    for (const wall of walls.values()) {
      if (wall.lastSeen !== now) continue;
      if (now - wall.firstSeen < this.options.persistenceMs) continue;
      if (!best || wall.price > best.price) best = wall;
    }
    return best ? { ...best } : null;
  }

  getWalls(instrument: string): IWallObservation[] {
    return [...(this.walls.get(instrument)?.values() ?? [])].map((w) => ({ ...w }));
  }
}
