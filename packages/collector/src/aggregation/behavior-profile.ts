import { DAMAGE_TAKEN_CAP } from "../constants";
import { CappedReservoir } from "./capped-reservoir";
import { buildProfileKey, type ProfileOwner } from "./profile-key";

export type ParamBucket =
  | "weaponSkills"
  | "spells"
  | "jobAbilities"
  | "dances"
  | "runes"
  | "monsterAbilities"
  | "petAbilities";

export type AnimationBucket = "meleeAnimations" | "rangedAnimations";

export interface CounterEntry {
  id: number;
  name: string;
  /** Last observed animation; later observations overwrite it. */
  animationId: number;
  count: number;
  damageSamples: CappedReservoir<number>;
}

export interface AnimationCounter {
  animationId: number;
  count: number;
}

export interface AdditionalEffectEntry {
  animation: number;
  spikeFlag: number;
  magnitude: number;
  message: number;
  count: number;
  /** Category name the effect was first observed under. */
  sourceCategory: string;
}

/**
 * Aggregated behavior of one Trust, or of one mob name within a zone.
 * Created on first observation and kept until an explicit reset.
 */
export class BehaviorProfile {
  readonly key: string;
  readonly modelId: number;
  totalSamples = 0;

  readonly counters: Record<ParamBucket, Map<number, CounterEntry>> = {
    weaponSkills: new Map(),
    spells: new Map(),
    jobAbilities: new Map(),
    dances: new Map(),
    runes: new Map(),
    monsterAbilities: new Map(),
    petAbilities: new Map(),
  };
  readonly animations: Record<AnimationBucket, Map<number, AnimationCounter>> = {
    meleeAnimations: new Map(),
    rangedAnimations: new Map(),
  };
  readonly additionalEffects = new Map<string, AdditionalEffectEntry>();
  readonly damageTaken = new CappedReservoir<number>(DAMAGE_TAKEN_CAP);

  constructor(readonly owner: ProfileOwner) {
    this.key = buildProfileKey(owner);
    this.modelId = owner.modelId;
  }

  get name(): string {
    return this.owner.name;
  }

  /** Sum of recorded damage taken; an indirect HP estimate for mobs. */
  get estimatedHp(): number {
    let total = 0;
    for (const magnitude of this.damageTaken.values()) {
      total += magnitude;
    }
    return total;
  }
}
