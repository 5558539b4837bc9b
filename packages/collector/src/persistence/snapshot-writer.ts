import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ProfileSnapshot } from "../aggregation/snapshot";
import type { ZoneOccupancySnapshot } from "../spatial/spatial-occupancy-tracker";

export interface CollectorSnapshot {
  profiles: ProfileSnapshot[];
  zones: ZoneOccupancySnapshot[];
}

export interface SnapshotWriteSummary {
  directory: string;
  profilesWritten: number;
  zonesWritten: number;
}

/**
 * Destination for periodic and on-demand snapshots.
 */
export interface SnapshotSink {
  write(snapshot: CollectorSnapshot): Promise<SnapshotWriteSummary>;
}

export interface SnapshotSummaryEntry {
  key: string;
  kind: ProfileSnapshot["kind"];
  name: string;
  zone?: string;
  modelId: number;
  samples: number;
  weaponSkills: number;
  spells: number;
  jobAbilities: number;
}

export interface SnapshotSummary {
  savedAt: string;
  profiles: SnapshotSummaryEntry[];
}

/**
 * Strips everything but letters, digits, spaces and dashes, then joins words
 * with underscores.
 */
export const sanitizeFileName = (name: string): string => {
  const cleaned = name
    .replaceAll(/[^\d\sA-Za-z-]/g, "")
    .trim()
    .replaceAll(/\s+/g, "_");
  return cleaned || "unnamed";
};

const hasData = (profile: ProfileSnapshot): boolean =>
  profile.totalSamples > 0 || (profile.damageTaken?.samples.length ?? 0) > 0;

export const buildSnapshotSummary = (
  profiles: ProfileSnapshot[],
  savedAt: string,
): SnapshotSummary => ({
  savedAt,
  profiles: profiles
    .map((profile) => ({
      key: profile.key,
      kind: profile.kind,
      name: profile.name,
      zone: profile.zone,
      modelId: profile.modelId,
      samples: profile.totalSamples,
      weaponSkills: profile.weaponSkills.length,
      spells: profile.spells.length,
      jobAbilities: profile.jobAbilities.length,
    }))
    .sort((a, b) => a.name.localeCompare(b.name) || a.key.localeCompare(b.key)),
});

// Claims a path for this write; a name that sanitizes to one already taken
// (compared case-insensitively) gets a numeric suffix.
const claimPath = (claimed: Set<string>, filePath: string): string => {
  const { dir, name, ext } = path.parse(filePath);
  let candidate = filePath;
  for (let suffix = 2; claimed.has(candidate.toLowerCase()); suffix += 1) {
    candidate = path.join(dir, `${name}_${suffix}${ext}`);
  }
  claimed.add(candidate.toLowerCase());
  return candidate;
};

/**
 * Writes snapshots as JSON files:
 * `trusts/<name>.json`, `mobs/<zone>/<name>.json`, `zones/<zone>.json` and
 * `_summary.json`. Profiles without any samples are only listed in the summary.
 * Distinct names that sanitize to the same file name are written as `<name>_2.json`,
 * `<name>_3.json` and so on, in snapshot order.
 */
export class SnapshotWriter implements SnapshotSink {
  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async write(snapshot: CollectorSnapshot): Promise<SnapshotWriteSummary> {
    const savedAt = this.now().toISOString();
    const profiles = snapshot.profiles.filter((profile) => hasData(profile));
    const claimed = new Set<string>();

    for (const profile of profiles) {
      await this.writeJson(claimPath(claimed, this.profilePath(profile)), {
        ...profile,
        capturedAt: savedAt,
      });
    }
    for (const zone of snapshot.zones) {
      await this.writeJson(
        claimPath(
          claimed,
          path.join(this.outputDir, "zones", `${sanitizeFileName(zone.zone)}.json`),
        ),
        { ...zone, capturedAt: savedAt },
      );
    }
    await this.writeJson(
      path.join(this.outputDir, "_summary.json"),
      buildSnapshotSummary(snapshot.profiles, savedAt),
    );

    return {
      directory: this.outputDir,
      profilesWritten: profiles.length,
      zonesWritten: snapshot.zones.length,
    };
  }

  profilePath(profile: ProfileSnapshot): string {
    const fileName = `${sanitizeFileName(profile.name)}.json`;
    if (profile.kind === "trust") {
      return path.join(this.outputDir, "trusts", fileName);
    }
    return path.join(this.outputDir, "mobs", sanitizeFileName(profile.zone ?? ""), fileName);
  }

  private async writeJson(filePath: string, value: unknown): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
  }
}
