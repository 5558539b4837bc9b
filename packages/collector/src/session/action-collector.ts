import {
  classifyCategory,
  decodeActionPacket,
  type CompletionCategory,
  type DecodeFailure,
  type DecodedAction,
} from "@actionscope/protocol";
import {
  DEFAULT_COLLECTOR_SETTINGS,
  logger as defaultLogger,
  type CollectorSettings,
  type Logger,
} from "@actionscope/shared-runtime";
import { BehaviorAggregator } from "../aggregation/behavior-aggregator";
import type { NameResolver } from "../aggregation/name-resolver";
import {
  buildProfileKey,
  mobOwnerOf,
  trustOwnerOf,
  type ProfileOwner,
} from "../aggregation/profile-key";
import type { ProfileSnapshot } from "../aggregation/snapshot";
import type { EntityRegistration } from "../classifier/classification-cache";
import { EntityClassifier } from "../classifier/entity-classifier";
import { MonotonicClock, type Clock } from "../clock";
import { DamageObservationTracker } from "../damage/damage-observation-tracker";
import {
  SnapshotWriter,
  type CollectorSnapshot,
  type SnapshotSink,
  type SnapshotWriteSummary,
} from "../persistence/snapshot-writer";
import { SpatialOccupancyTracker } from "../spatial/spatial-occupancy-tracker";
import { runCollectorCommand } from "./commands";
import { EntityClass, type ClientOracle, type EntityPresenceUpdate } from "../types";

export interface ActionCollectorOptions {
  client: ClientOracle;
  settings?: Partial<CollectorSettings>;
  names?: NameResolver;
  sink?: SnapshotSink;
  clock?: Clock;
  logger?: Logger;
  /** Zone the session starts in. */
  zone?: string;
}

export type PacketIgnoreReason =
  | "tracking_disabled"
  | "injected"
  | "unknown_actor"
  | "announcement"
  | "unrecognized_category";

export type PacketOutcome =
  | { status: "ignored"; reason: PacketIgnoreReason }
  | { status: "dropped"; error: DecodeFailure }
  | {
      status: "recorded";
      entityClass: EntityClass.Trust | EntityClass.Mob;
      profileKey: string;
      observations: number;
    }
  | { status: "damage_observed"; observations: number };

export interface ActionPacketMeta {
  /** Set when the packet was fabricated client-side rather than sent by the server. */
  injected?: boolean;
}

export interface TickOutcome {
  scanned: boolean;
  saved: boolean;
  saveFailed: boolean;
}

/**
 * Wires decoding, classification and aggregation to the host's packet,
 * tick and lifecycle callbacks.
 *
 * Packet handling is synchronous and processes packets in delivery order.
 * Only snapshot writes are asynchronous; the snapshot is taken before the
 * write starts, and writes never overlap.
 */
export class ActionCollector {
  readonly classifier: EntityClassifier;
  readonly aggregator: BehaviorAggregator;
  readonly spatial: SpatialOccupancyTracker;
  readonly damage: DamageObservationTracker;

  private readonly client: ClientOracle;
  private readonly settings: CollectorSettings;
  private readonly sink: SnapshotSink;
  private readonly clock: Clock;
  private readonly log: Logger;
  private tracking: boolean;
  private lastPartyScanMs: number;
  private lastSaveMs: number;
  private pendingSave: Promise<SnapshotWriteSummary> | undefined;

  constructor(options: ActionCollectorOptions) {
    const baseLogger = options.logger ?? defaultLogger;
    this.client = options.client;
    this.settings = { ...DEFAULT_COLLECTOR_SETTINGS, ...options.settings };
    this.log = baseLogger.child({ component: "action-collector" });
    this.clock = options.clock ?? new MonotonicClock();
    this.sink = options.sink ?? new SnapshotWriter(this.settings.outputDir);

    this.classifier = new EntityClassifier(options.client, {
      zone: options.zone,
      logger: baseLogger,
    });
    this.aggregator = new BehaviorAggregator({ names: options.names });
    this.spatial = new SpatialOccupancyTracker();
    this.damage = new DamageObservationTracker(this.classifier, this.aggregator);

    this.tracking = this.settings.trackingEnabled;
    const now = this.clock.nowMs();
    this.lastPartyScanMs = now;
    this.lastSaveMs = now;
  }

  get isTracking(): boolean {
    return this.tracking;
  }

  get currentZone(): string {
    return this.classifier.currentZone;
  }

  get outputDir(): string {
    return this.settings.outputDir;
  }

  /**
   * Handles one action packet. A malformed packet is dropped as a whole and
   * has no effect on any profile. Injected packets are never aggregated.
   */
  handleActionPacket(buffer: Uint8Array, meta: ActionPacketMeta = {}): PacketOutcome {
    if (!this.tracking) {
      return { status: "ignored", reason: "tracking_disabled" };
    }
    if (meta.injected) {
      return { status: "ignored", reason: "injected" };
    }

    const decoded = decodeActionPacket(buffer);
    if (!decoded.ok) {
      this.log.debug(
        { reason: decoded.error.reason },
        `Dropped action packet: ${decoded.error.message}`,
      );
      return { status: "dropped", error: decoded.error };
    }
    const { action } = decoded;

    const actor = this.classifier.resolve(action.actorId);
    if (actor.entityClass === EntityClass.Unknown) {
      return { status: "ignored", reason: "unknown_actor" };
    }

    // Readying and casting-start packets announce an action; only completions count.
    const disposition = classifyCategory(action.category);
    if (disposition.kind === "announcement") {
      return { status: "ignored", reason: "announcement" };
    }
    if (disposition.kind === "unrecognized") {
      return { status: "ignored", reason: "unrecognized_category" };
    }

    if (actor.entityClass === EntityClass.Player) {
      return this.observePlayerDamage(action);
    }

    const owner =
      actor.entityClass === EntityClass.Trust
        ? trustOwnerOf(actor.registration)
        : mobOwnerOf(actor.registration);
    return {
      status: "recorded",
      entityClass: actor.entityClass,
      profileKey: buildProfileKey(owner),
      observations: this.recordActions(owner, action, disposition.category),
    };
  }

  /**
   * Feeds a named NPC that classifies as a Mob into the zone's spawn table.
   * Returns true when the sighting was recorded.
   */
  handleEntityPresence(update: EntityPresenceUpdate): boolean {
    if (!this.tracking || !update.isNpc || !update.name) {
      return false;
    }

    const entity = this.classifier.resolve(update.id);
    if (entity.entityClass !== EntityClass.Mob) {
      return false;
    }

    const { registration } = entity;
    const position = update.position ?? this.client.getEntity(update.id)?.position;
    this.spatial.observe(registration.zone, registration.name, registration.modelId, position);
    return true;
  }

  /**
   * Polling timer driven by the host's tick callback. Each job fires at most
   * once per call, when its interval has elapsed on the monotonic clock.
   */
  async tick(): Promise<TickOutcome> {
    const outcome: TickOutcome = { scanned: false, saved: false, saveFailed: false };
    if (!this.tracking) {
      return outcome;
    }

    const now = this.clock.nowMs();
    if (now - this.lastPartyScanMs > this.settings.partyScanIntervalMs) {
      this.scanParty();
      this.lastPartyScanMs = now;
      outcome.scanned = true;
    }

    if (now - this.lastSaveMs > this.settings.autoSaveIntervalMs && this.hasData()) {
      try {
        await this.save();
        outcome.saved = true;
      } catch (error) {
        this.log.error({ err: error }, "Autosave failed");
        outcome.saveFailed = true;
      }
    }
    return outcome;
  }

  /**
   * Registers Trusts currently in the party and creates their profiles.
   */
  scanParty(): EntityRegistration[] {
    const registered = this.classifier.scanParty();
    for (const registration of registered) {
      this.aggregator.ensureProfile(trustOwnerOf(registration));
    }
    return registered;
  }

  onZoneChange(zone: string): void {
    this.classifier.onZoneChange(zone);
  }

  onLogin(): void {
    this.log.info(`Player logged in. Tracking is ${this.tracking ? "ON" : "OFF"}.`);
    if (this.tracking) {
      this.scanParty();
    }
  }

  /**
   * Saves what was collected, then clears entity classifications. Ids are not
   * stable across sessions, so the caches are cleared even when the save fails.
   */
  async onLogout(): Promise<void> {
    try {
      if (this.hasData()) {
        await this.save();
      }
    } catch (error) {
      this.log.error({ err: error }, "Save on logout failed");
    } finally {
      this.classifier.clear();
    }
    this.log.info("Logged out; entity classifications cleared");
  }

  start(): void {
    this.tracking = true;
    this.scanParty();
    this.log.info("Tracking started");
  }

  async stop(): Promise<SnapshotWriteSummary> {
    this.tracking = false;
    this.log.info("Tracking stopped");
    return this.save();
  }

  reset(): void {
    this.aggregator.reset();
    this.spatial.reset();
    this.classifier.clear();
    this.log.info("All collected data cleared");
  }

  /**
   * Runs a user command and logs each output line.
   */
  async runCommand(name: string | undefined, args: string[] = []): Promise<string[]> {
    const lines = await runCollectorCommand(this, name, args);
    for (const line of lines) {
      this.log.info(line);
    }
    return lines;
  }

  snapshot(): CollectorSnapshot {
    return {
      profiles: this.aggregator.snapshots(),
      zones: this.spatial.snapshots(),
    };
  }

  profileSnapshots(): ProfileSnapshot[] {
    return this.aggregator.snapshots();
  }

  /**
   * Writes the current snapshot. A call made while a write is in flight
   * shares that write.
   */
  async save(): Promise<SnapshotWriteSummary> {
    if (this.pendingSave) {
      return this.pendingSave;
    }

    const snapshot = this.snapshot();
    this.lastSaveMs = this.clock.nowMs();
    const write = this.sink.write(snapshot);
    this.pendingSave = write;
    try {
      const summary = await write;
      if (summary.profilesWritten > 0) {
        this.log.info(
          { zones: summary.zonesWritten },
          `Saved ${summary.profilesWritten} profile(s) to ${summary.directory}`,
        );
      }
      return summary;
    } finally {
      this.pendingSave = undefined;
    }
  }

  private hasData(): boolean {
    const hasSamples = this.aggregator
      .allProfiles()
      .some((profile) => profile.totalSamples > 0 || profile.damageTaken.length > 0);
    return hasSamples || this.spatial.zoneNames().length > 0;
  }

  private recordActions(
    owner: ProfileOwner,
    action: DecodedAction,
    category: CompletionCategory,
  ): number {
    let observations = 0;
    for (const target of action.targets) {
      for (const effect of target.actions) {
        this.aggregator.record(owner, {
          category,
          param: action.param,
          animationId: effect.animation,
          magnitude: effect.magnitude,
          additionalEffect: effect.additionalEffect,
        });
        observations += 1;
      }
    }
    return observations;
  }

  private observePlayerDamage(action: DecodedAction): PacketOutcome {
    let observations = 0;
    for (const target of action.targets) {
      for (const effect of target.actions) {
        if (this.damage.observeDamage(target.id, effect.magnitude)) {
          observations += 1;
        }
      }
    }
    return { status: "damage_observed", observations };
  }
}
