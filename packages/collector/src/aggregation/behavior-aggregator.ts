import {
  ActionCategory,
  CATEGORY_NAMES,
  type AdditionalEffect,
  type CompletionCategory,
} from "@actionscope/protocol";
import { DAMAGE_SAMPLE_CAP } from "../constants";
import {
  BehaviorProfile,
  type AnimationBucket,
  type CounterEntry,
  type ParamBucket,
} from "./behavior-profile";
import { CappedReservoir } from "./capped-reservoir";
import { EMPTY_NAME_RESOLVER, resolveActionName, type NameResolver } from "./name-resolver";
import {
  buildProfileKey,
  type MobOwner,
  type ProfileIdentity,
  type ProfileOwner,
} from "./profile-key";
import { snapshotProfile, type ProfileSnapshot } from "./snapshot";

/**
 * One completed action, as seen on one target.
 */
export interface ActionObservation {
  category: CompletionCategory;
  param: number;
  animationId: number;
  magnitude: number;
  additionalEffect?: AdditionalEffect;
}

type BucketRule =
  | { kind: "animation"; bucket: AnimationBucket }
  | { kind: "param"; bucket: ParamBucket; nameTag: string; tracksMagnitude: boolean }
  | { kind: "none" };

const BUCKET_RULES: Record<CompletionCategory, BucketRule> = {
  [ActionCategory.Melee]: { kind: "animation", bucket: "meleeAnimations" },
  [ActionCategory.Ranged]: { kind: "animation", bucket: "rangedAnimations" },
  [ActionCategory.WeaponSkill]: {
    kind: "param",
    bucket: "weaponSkills",
    nameTag: "WS",
    tracksMagnitude: true,
  },
  [ActionCategory.Magic]: {
    kind: "param",
    bucket: "spells",
    nameTag: "Spell",
    tracksMagnitude: false,
  },
  [ActionCategory.Item]: { kind: "none" },
  [ActionCategory.JobAbility]: {
    kind: "param",
    bucket: "jobAbilities",
    nameTag: "JA",
    tracksMagnitude: false,
  },
  [ActionCategory.Unassigned]: { kind: "none" },
  [ActionCategory.MonsterAbility]: {
    kind: "param",
    bucket: "monsterAbilities",
    nameTag: "MobAbility",
    tracksMagnitude: true,
  },
  [ActionCategory.PetAbility]: {
    kind: "param",
    bucket: "petAbilities",
    nameTag: "PetAbility",
    tracksMagnitude: true,
  },
  [ActionCategory.Dance]: { kind: "param", bucket: "dances", nameTag: "JA", tracksMagnitude: false },
  [ActionCategory.Rune]: { kind: "param", bucket: "runes", nameTag: "JA", tracksMagnitude: false },
};

export interface BehaviorAggregatorOptions {
  names?: NameResolver;
}

/**
 * Folds completed actions into per-entity behavior profiles.
 *
 * Announcement categories (readying, casting start, item start, ranged start)
 * must be filtered out by the caller; {@link ActionObservation} only admits
 * completion categories.
 */
export class BehaviorAggregator {
  private readonly profiles = new Map<string, BehaviorProfile>();
  private readonly names: NameResolver;

  constructor(options: BehaviorAggregatorOptions = {}) {
    this.names = options.names ?? EMPTY_NAME_RESOLVER;
  }

  get size(): number {
    return this.profiles.size;
  }

  ensureProfile(owner: ProfileOwner): BehaviorProfile {
    const key = buildProfileKey(owner);
    let profile = this.profiles.get(key);
    if (!profile) {
      profile = new BehaviorProfile(owner);
      this.profiles.set(key, profile);
    }
    return profile;
  }

  getProfile(key: string): BehaviorProfile | undefined {
    return this.profiles.get(key);
  }

  findProfile(identity: ProfileIdentity): BehaviorProfile | undefined {
    return this.profiles.get(buildProfileKey(identity));
  }

  allProfiles(): BehaviorProfile[] {
    return [...this.profiles.values()];
  }

  record(owner: ProfileOwner, observation: ActionObservation): BehaviorProfile {
    const profile = this.ensureProfile(owner);
    profile.totalSamples += 1;

    const rule = BUCKET_RULES[observation.category];
    switch (rule.kind) {
      case "animation": {
        this.countAnimation(profile, rule.bucket, observation.animationId);
        break;
      }
      case "param": {
        this.countParam(profile, rule, observation);
        break;
      }
      case "none": {
        break;
      }
    }

    if (observation.additionalEffect) {
      this.countAdditionalEffect(
        profile,
        observation.additionalEffect,
        CATEGORY_NAMES[observation.category],
      );
    }
    return profile;
  }

  /**
   * Appends a damage value dealt to a mob. Non-positive values are ignored.
   */
  recordDamageTaken(owner: MobOwner, magnitude: number): void {
    if (!(magnitude > 0)) {
      return;
    }
    this.ensureProfile(owner).damageTaken.append(magnitude);
  }

  snapshot(key: string): ProfileSnapshot | undefined {
    const profile = this.profiles.get(key);
    return profile ? snapshotProfile(profile) : undefined;
  }

  snapshots(): ProfileSnapshot[] {
    return this.allProfiles().map((profile) => snapshotProfile(profile));
  }

  reset(): void {
    this.profiles.clear();
  }

  private countAnimation(
    profile: BehaviorProfile,
    bucket: AnimationBucket,
    animationId: number,
  ): void {
    const counters = profile.animations[bucket];
    const counter = counters.get(animationId);
    if (counter) {
      counter.count += 1;
      return;
    }
    counters.set(animationId, { animationId, count: 1 });
  }

  private countParam(
    profile: BehaviorProfile,
    rule: Extract<BucketRule, { kind: "param" }>,
    observation: ActionObservation,
  ): void {
    const counters = profile.counters[rule.bucket];
    let entry: CounterEntry | undefined = counters.get(observation.param);
    if (!entry) {
      entry = {
        id: observation.param,
        name: resolveActionName(this.names, observation.category, observation.param, rule.nameTag),
        animationId: observation.animationId,
        count: 0,
        damageSamples: new CappedReservoir<number>(DAMAGE_SAMPLE_CAP),
      };
      counters.set(observation.param, entry);
    }

    entry.count += 1;
    entry.animationId = observation.animationId;
    if (rule.tracksMagnitude && observation.magnitude > 0) {
      entry.damageSamples.append(observation.magnitude);
    }
  }

  private countAdditionalEffect(
    profile: BehaviorProfile,
    effect: AdditionalEffect,
    sourceCategory: string,
  ): void {
    const key = `${effect.animation}_${effect.magnitude}`;
    const entry = profile.additionalEffects.get(key);
    if (entry) {
      entry.count += 1;
      return;
    }
    profile.additionalEffects.set(key, {
      animation: effect.animation,
      spikeFlag: effect.spikeFlag,
      magnitude: effect.magnitude,
      message: effect.message,
      count: 1,
      sourceCategory,
    });
  }
}
