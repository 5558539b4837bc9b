import { logger as defaultLogger, type Logger } from "@actionscope/shared-runtime";
import { UNKNOWN_ENTITY_NAME, UNKNOWN_ZONE } from "../constants";
import { EntityClass, type ClientOracle } from "../types";
import {
  ClassificationCache,
  type ClassifiedEntity,
  type EntityRegistration,
} from "./classification-cache";

export interface EntityClassifierOptions {
  zone?: string;
  logger?: Logger;
}

/**
 * Decides whether an entity id is a Trust, Mob, Player or (for now) Unknown.
 *
 * Resolution order: cached class; Unknown if the client cannot resolve the id
 * (not cached, so the next sighting retries); Player if not an NPC; Trust if an
 * NPC in the party; Mob otherwise. Every class except Unknown is cached until
 * the next zone change.
 */
export class EntityClassifier {
  private readonly cache = new ClassificationCache();
  private readonly log: Logger;
  private zone: string;

  constructor(
    private readonly client: ClientOracle,
    options: EntityClassifierOptions = {},
  ) {
    this.zone = options.zone ?? UNKNOWN_ZONE;
    this.log = (options.logger ?? defaultLogger).child({ component: "entity-classifier" });
  }

  get currentZone(): string {
    return this.zone;
  }

  classify(id: number): EntityClass {
    return this.resolve(id).entityClass;
  }

  resolve(id: number): ClassifiedEntity {
    const cached = this.cache.lookup(id);
    if (cached) {
      return cached;
    }

    const entity = this.client.getEntity(id);
    if (!entity) {
      return { entityClass: EntityClass.Unknown };
    }

    if (!entity.isNpc) {
      this.cache.registerPlayer(id);
      return { entityClass: EntityClass.Player };
    }

    const registration: EntityRegistration = {
      id,
      index: entity.index,
      name: entity.name || UNKNOWN_ENTITY_NAME,
      modelId: entity.modelId,
      zone: this.zone,
    };

    if (this.client.isPartyMember(id)) {
      this.cache.registerTrust(registration);
      this.log.info(
        { entityId: id, modelId: registration.modelId },
        `Tracking trust: ${registration.name}`,
      );
      return { entityClass: EntityClass.Trust, registration };
    }

    this.cache.registerMob(registration);
    this.log.debug(
      { entityId: id, modelId: registration.modelId, zone: this.zone },
      `Tracking mob: ${registration.name}`,
    );
    return { entityClass: EntityClass.Mob, registration };
  }

  /**
   * Classifies every party member not yet seen so Trusts are registered before
   * they act. Returns the Trusts registered by this scan.
   */
  scanParty(): EntityRegistration[] {
    const playerId = this.client.getPlayerId();
    const registered: EntityRegistration[] = [];

    for (const id of this.client.getPartyMemberIds()) {
      if (id === playerId || this.cache.lookup(id)) {
        continue;
      }
      const resolved = this.resolve(id);
      if (resolved.entityClass === EntityClass.Trust) {
        registered.push(resolved.registration);
      }
    }
    return registered;
  }

  getRegistration(id: number): EntityRegistration | undefined {
    const cached = this.cache.lookup(id);
    if (
      cached?.entityClass === EntityClass.Trust ||
      cached?.entityClass === EntityClass.Mob
    ) {
      return cached.registration;
    }
    return undefined;
  }

  activeTrusts(): EntityRegistration[] {
    return this.cache.trustRegistrations();
  }

  onZoneChange(zone: string): void {
    this.zone = zone;
    this.cache.clear();
    this.log.info({ zone }, "Zone changed; entity classifications cleared");
  }

  clear(): void {
    this.cache.clear();
  }
}
