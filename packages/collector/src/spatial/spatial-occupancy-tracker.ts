import { truncateDecimals } from "@actionscope/protocol";
import { CappedReservoir } from "../aggregation/capped-reservoir";
import { sortByCount } from "../aggregation/snapshot";
import { MIN_POSITION_SPACING_SQ, POSITION_DECIMALS, POSITION_SAMPLE_CAP } from "../constants";
import type { Position } from "../types";

export interface ZoneEntityEntry {
  name: string;
  /** First observed model id; never overwritten. */
  modelId: number;
  count: number;
  positions: CappedReservoir<Position>;
}

export interface ZoneEntitySnapshot {
  name: string;
  modelId: number;
  count: number;
  positions: Position[];
}

export interface ZoneOccupancySnapshot {
  zone: string;
  entities: ZoneEntitySnapshot[];
}

const truncatePosition = (position: Position): Position => ({
  x: truncateDecimals(position.x, POSITION_DECIMALS),
  y: truncateDecimals(position.y, POSITION_DECIMALS),
  z: truncateDecimals(position.z, POSITION_DECIMALS),
});

const planarDistanceSq = (a: Position, b: Position): number => {
  const dx = a.x - b.x;
  const dz = a.z - b.z;
  return dx * dx + dz * dz;
};

/**
 * Per-zone spawn table: how often each named entity was seen and a sparse
 * sketch of where.
 */
export class SpatialOccupancyTracker {
  private readonly zones = new Map<string, Map<string, ZoneEntityEntry>>();

  /**
   * Counts a sighting. A position is kept only while fewer than
   * {@link POSITION_SAMPLE_CAP} are stored and it lies at least 5 units
   * (planar) from every stored sample for that name.
   */
  observe(zone: string, name: string, modelId: number, position?: Position): void {
    let entities = this.zones.get(zone);
    if (!entities) {
      entities = new Map();
      this.zones.set(zone, entities);
    }

    let entry = entities.get(name);
    if (!entry) {
      entry = {
        name,
        modelId,
        count: 0,
        positions: new CappedReservoir<Position>(POSITION_SAMPLE_CAP),
      };
      entities.set(name, entry);
    }
    entry.count += 1;

    if (!position || entry.positions.isFull) {
      return;
    }
    const sample = truncatePosition(position);
    const tooClose = entry.positions
      .values()
      .some((stored) => planarDistanceSq(stored, sample) < MIN_POSITION_SPACING_SQ);
    if (!tooClose) {
      entry.positions.append(sample);
    }
  }

  getEntry(zone: string, name: string): ZoneEntityEntry | undefined {
    return this.zones.get(zone)?.get(name);
  }

  zoneNames(): string[] {
    return [...this.zones.keys()];
  }

  snapshot(zone: string): ZoneOccupancySnapshot | undefined {
    const entities = this.zones.get(zone);
    if (!entities) {
      return undefined;
    }
    return {
      zone,
      entities: sortByCount(entities.values()).map((entry) => ({
        name: entry.name,
        modelId: entry.modelId,
        count: entry.count,
        positions: entry.positions.toArray(),
      })),
    };
  }

  snapshots(): ZoneOccupancySnapshot[] {
    const snapshots: ZoneOccupancySnapshot[] = [];
    for (const zone of this.zones.keys()) {
      const snapshot = this.snapshot(zone);
      if (snapshot) {
        snapshots.push(snapshot);
      }
    }
    return snapshots;
  }

  reset(): void {
    this.zones.clear();
  }
}
