import { EntityClass } from "../types";

/**
 * Identity captured when an NPC is first classified as a Trust or Mob.
 */
export interface EntityRegistration {
  id: number;
  index?: number;
  name: string;
  modelId: number;
  /** Zone the entity was classified in. */
  zone: string;
}

export type ClassifiedEntity =
  | { entityClass: EntityClass.Trust; registration: EntityRegistration }
  | { entityClass: EntityClass.Mob; registration: EntityRegistration }
  | { entityClass: EntityClass.Player }
  | { entityClass: EntityClass.Unknown };

/**
 * Sticky per-zone-session classification store. Entity ids are only stable
 * within a zone, so the whole store is cleared on zone transition.
 */
export class ClassificationCache {
  private readonly trusts = new Map<number, EntityRegistration>();
  private readonly mobs = new Map<number, EntityRegistration>();
  private readonly players = new Set<number>();

  get size(): number {
    return this.trusts.size + this.mobs.size + this.players.size;
  }

  lookup(id: number): ClassifiedEntity | undefined {
    const trust = this.trusts.get(id);
    if (trust) {
      return { entityClass: EntityClass.Trust, registration: trust };
    }
    const mob = this.mobs.get(id);
    if (mob) {
      return { entityClass: EntityClass.Mob, registration: mob };
    }
    if (this.players.has(id)) {
      return { entityClass: EntityClass.Player };
    }
    return undefined;
  }

  registerTrust(registration: EntityRegistration): void {
    this.trusts.set(registration.id, registration);
  }

  registerMob(registration: EntityRegistration): void {
    this.mobs.set(registration.id, registration);
  }

  registerPlayer(id: number): void {
    this.players.add(id);
  }

  trustRegistrations(): EntityRegistration[] {
    return [...this.trusts.values()];
  }

  clear(): void {
    this.trusts.clear();
    this.mobs.clear();
    this.players.clear();
  }
}
