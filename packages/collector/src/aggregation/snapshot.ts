import type {
  AdditionalEffectEntry,
  AnimationCounter,
  BehaviorProfile,
  CounterEntry,
} from "./behavior-profile";

export interface CounterSnapshot {
  id: number;
  name: string;
  animationId: number;
  count: number;
  damageSamples: number[];
}

export type AnimationSnapshot = AnimationCounter;

export type AdditionalEffectSnapshot = AdditionalEffectEntry;

export interface DamageTakenSnapshot {
  samples: number[];
  estimatedHp: number;
}

/**
 * Serializable view of a profile. Every collection is sorted by descending count.
 */
export interface ProfileSnapshot {
  key: string;
  kind: "trust" | "mob";
  name: string;
  zone?: string;
  modelId: number;
  totalSamples: number;
  weaponSkills: CounterSnapshot[];
  spells: CounterSnapshot[];
  jobAbilities: CounterSnapshot[];
  dances: CounterSnapshot[];
  runes: CounterSnapshot[];
  monsterAbilities: CounterSnapshot[];
  petAbilities: CounterSnapshot[];
  meleeAnimations: AnimationSnapshot[];
  rangedAnimations: AnimationSnapshot[];
  additionalEffects: AdditionalEffectSnapshot[];
  damageTaken?: DamageTakenSnapshot;
}

/**
 * Sorts by descending count; ties keep insertion order.
 */
export const sortByCount = <T extends { count: number }>(items: Iterable<T>): T[] =>
  [...items].sort((a, b) => b.count - a.count);

const snapshotCounters = (counters: Map<number, CounterEntry>): CounterSnapshot[] =>
  sortByCount(counters.values()).map((entry) => ({
    id: entry.id,
    name: entry.name,
    animationId: entry.animationId,
    count: entry.count,
    damageSamples: entry.damageSamples.toArray(),
  }));

const snapshotAnimations = (counters: Map<number, AnimationCounter>): AnimationSnapshot[] =>
  sortByCount(counters.values()).map((entry) => ({ ...entry }));

export const snapshotProfile = (profile: BehaviorProfile): ProfileSnapshot => {
  const { owner } = profile;
  const snapshot: ProfileSnapshot = {
    key: profile.key,
    kind: owner.kind,
    name: owner.name,
    modelId: profile.modelId,
    totalSamples: profile.totalSamples,
    weaponSkills: snapshotCounters(profile.counters.weaponSkills),
    spells: snapshotCounters(profile.counters.spells),
    jobAbilities: snapshotCounters(profile.counters.jobAbilities),
    dances: snapshotCounters(profile.counters.dances),
    runes: snapshotCounters(profile.counters.runes),
    monsterAbilities: snapshotCounters(profile.counters.monsterAbilities),
    petAbilities: snapshotCounters(profile.counters.petAbilities),
    meleeAnimations: snapshotAnimations(profile.animations.meleeAnimations),
    rangedAnimations: snapshotAnimations(profile.animations.rangedAnimations),
    additionalEffects: sortByCount(profile.additionalEffects.values()).map((entry) => ({
      ...entry,
    })),
  };

  if (owner.kind === "mob") {
    snapshot.zone = owner.zone;
    snapshot.damageTaken = {
      samples: profile.damageTaken.toArray(),
      estimatedHp: profile.estimatedHp,
    };
  }
  return snapshot;
};
