export enum EntityClass {
  Trust = "trust",
  Mob = "mob",
  Player = "player",
  Unknown = "unknown",
}

export interface Position {
  x: number;
  y: number;
  z: number;
}

/**
 * What the game client currently knows about an entity.
 */
export interface ObservedEntity {
  id: number;
  index?: number;
  name: string;
  modelId: number;
  isNpc: boolean;
  position?: Position;
}

/**
 * Lookups the host game client provides.
 */
export interface ClientOracle {
  /** Returns undefined when the client cannot resolve the id (e.g. out of range). */
  getEntity(id: number): ObservedEntity | undefined;
  isPartyMember(id: number): boolean;
  getPartyMemberIds(): number[];
  getPlayerId(): number | undefined;
}

/**
 * The parts of an entity presence packet the collector needs.
 */
export interface EntityPresenceUpdate {
  id: number;
  index?: number;
  isNpc: boolean;
  name?: string;
  position?: Position;
}
