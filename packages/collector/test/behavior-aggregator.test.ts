import { ActionCategory } from "@actionscope/protocol";
import { describe, expect, it } from "vitest";
import { BehaviorAggregator, type ActionObservation } from "../src/aggregation/behavior-aggregator";
import { createTableNameResolver } from "../src/aggregation/name-resolver";
import type { MobOwner, TrustOwner } from "../src/aggregation/profile-key";

const zeid: TrustOwner = { kind: "trust", name: "Zeid II", modelId: 3010 };
const rabbit: MobOwner = { kind: "mob", zone: "West Ronfaure", name: "Wild Rabbit", modelId: 270 };

const createObservation = (overrides: Partial<ActionObservation> = {}): ActionObservation => ({
  category: ActionCategory.WeaponSkill,
  param: 30,
  animationId: 63,
  magnitude: 450,
  ...overrides,
});

describe("BehaviorAggregator", () => {
  it("counts weapon skills with resolved names and damage samples", () => {
    const aggregator = new BehaviorAggregator({
      names: createTableNameResolver({ weaponSkills: { "30": "Savage Blade" } }),
    });

    aggregator.record(zeid, createObservation());

    const snapshot = aggregator.snapshot("trust:Zeid II");
    expect(snapshot?.totalSamples).toBe(1);
    expect(snapshot?.weaponSkills).toEqual([
      { id: 30, name: "Savage Blade", animationId: 63, count: 1, damageSamples: [450] },
    ]);
    expect(snapshot?.zone).toBeUndefined();
    expect(snapshot?.damageTaken).toBeUndefined();
  });

  it("keeps the last observed animation id", () => {
    const aggregator = new BehaviorAggregator();

    aggregator.record(zeid, createObservation({ animationId: 63 }));
    aggregator.record(zeid, createObservation({ animationId: 64 }));

    const [entry] = aggregator.snapshot("trust:Zeid II")?.weaponSkills ?? [];
    expect(entry?.animationId).toBe(64);
    expect(entry?.count).toBe(2);
  });

  it("stops sampling damage at the cap but keeps counting", () => {
    const aggregator = new BehaviorAggregator();

    for (let index = 1; index <= 150; index += 1) {
      aggregator.record(zeid, createObservation({ magnitude: index }));
    }

    const [entry] = aggregator.snapshot("trust:Zeid II")?.weaponSkills ?? [];
    expect(entry?.count).toBe(150);
    expect(entry?.damageSamples).toHaveLength(100);
    expect(entry?.damageSamples.at(-1)).toBe(100);
  });

  it("ignores zero magnitudes and does not sample spells", () => {
    const aggregator = new BehaviorAggregator();

    aggregator.record(zeid, createObservation({ magnitude: 0 }));
    aggregator.record(zeid, createObservation({ category: ActionCategory.Magic, param: 144 }));

    const snapshot = aggregator.snapshot("trust:Zeid II");
    expect(snapshot?.weaponSkills[0]?.damageSamples).toEqual([]);
    expect(snapshot?.spells[0]?.damageSamples).toEqual([]);
  });

  it("uses placeholder names for unmapped params", () => {
    const aggregator = new BehaviorAggregator();

    aggregator.record(zeid, createObservation({ category: ActionCategory.Magic, param: 144 }));
    aggregator.record(zeid, createObservation({ category: ActionCategory.JobAbility, param: 50 }));
    aggregator.record(rabbit, createObservation({ category: ActionCategory.MonsterAbility, param: 256 }));
    aggregator.record(zeid, createObservation({ category: ActionCategory.PetAbility, param: 7 }));
    aggregator.record(zeid, createObservation({ category: ActionCategory.Dance, param: 8 }));

    const trust = aggregator.snapshot("trust:Zeid II");
    expect(trust?.spells[0]?.name).toBe("Unknown_Spell_144");
    expect(trust?.jobAbilities[0]?.name).toBe("Unknown_JA_50");
    expect(trust?.petAbilities[0]?.name).toBe("Unknown_PetAbility_7");
    expect(trust?.dances[0]?.name).toBe("Unknown_JA_8");
    expect(aggregator.snapshot("mob:West Ronfaure:Wild Rabbit")?.monsterAbilities[0]?.name).toBe(
      "Unknown_MobAbility_256",
    );
  });

  it("counts melee and ranged animations", () => {
    const aggregator = new BehaviorAggregator();

    aggregator.record(zeid, createObservation({ category: ActionCategory.Melee, animationId: 1 }));
    aggregator.record(zeid, createObservation({ category: ActionCategory.Melee, animationId: 1 }));
    aggregator.record(zeid, createObservation({ category: ActionCategory.Melee, animationId: 2 }));
    aggregator.record(zeid, createObservation({ category: ActionCategory.Ranged, animationId: 5 }));

    const snapshot = aggregator.snapshot("trust:Zeid II");
    expect(snapshot?.meleeAnimations).toEqual([
      { animationId: 1, count: 2 },
      { animationId: 2, count: 1 },
    ]);
    expect(snapshot?.rangedAnimations).toEqual([{ animationId: 5, count: 1 }]);
    expect(snapshot?.totalSamples).toBe(4);
  });

  it("counts items only towards the sample total", () => {
    const aggregator = new BehaviorAggregator();

    aggregator.record(zeid, createObservation({ category: ActionCategory.Item, param: 4112 }));

    const snapshot = aggregator.snapshot("trust:Zeid II");
    expect(snapshot?.totalSamples).toBe(1);
    expect(snapshot?.weaponSkills).toEqual([]);
    expect(snapshot?.jobAbilities).toEqual([]);
  });

  it("groups additional effects by animation and magnitude", () => {
    const aggregator = new BehaviorAggregator();
    const additionalEffect = { animation: 21, spikeFlag: 0, magnitude: 12, message: 163 };

    aggregator.record(zeid, createObservation({ category: ActionCategory.Melee, additionalEffect }));
    aggregator.record(zeid, createObservation({ additionalEffect }));
    aggregator.record(
      zeid,
      createObservation({ additionalEffect: { ...additionalEffect, magnitude: 13 } }),
    );

    expect(aggregator.snapshot("trust:Zeid II")?.additionalEffects).toEqual([
      { animation: 21, spikeFlag: 0, magnitude: 12, message: 163, count: 2, sourceCategory: "melee" },
      {
        animation: 21,
        spikeFlag: 0,
        magnitude: 13,
        message: 163,
        count: 1,
        sourceCategory: "weapon_skill",
      },
    ]);
  });

  it("merges same-named mobs in one zone and separates zones", () => {
    const aggregator = new BehaviorAggregator();
    const otherZone: MobOwner = { ...rabbit, zone: "East Ronfaure" };

    aggregator.record(rabbit, createObservation({ category: ActionCategory.Melee }));
    aggregator.record({ ...rabbit, modelId: 271 }, createObservation({ category: ActionCategory.Melee }));
    aggregator.record(otherZone, createObservation({ category: ActionCategory.Melee }));

    expect(aggregator.size).toBe(2);
    const merged = aggregator.snapshot("mob:West Ronfaure:Wild Rabbit");
    expect(merged?.totalSamples).toBe(2);
    expect(merged?.modelId).toBe(270);
  });

  it("keeps zone and name segments apart in profile keys", () => {
    const aggregator = new BehaviorAggregator();
    const melee = createObservation({ category: ActionCategory.Melee });

    aggregator.record({ kind: "mob", zone: "A:B", name: "C", modelId: 1 }, melee);
    aggregator.record({ kind: "mob", zone: "A", name: "B:C", modelId: 2 }, melee);

    expect(aggregator.size).toBe(2);
    expect(aggregator.snapshots().map((snapshot) => snapshot.key)).toEqual([
      "mob:A%3AB:C",
      "mob:A:B%3AC",
    ]);
  });

  it("records damage taken for mobs and sums it as estimated HP", () => {
    const aggregator = new BehaviorAggregator();

    aggregator.recordDamageTaken(rabbit, 40);
    aggregator.recordDamageTaken(rabbit, 0);
    aggregator.recordDamageTaken(rabbit, 35);

    expect(aggregator.snapshot("mob:West Ronfaure:Wild Rabbit")?.damageTaken).toEqual({
      samples: [40, 35],
      estimatedHp: 75,
    });
  });

  it("sorts counters by descending count", () => {
    const aggregator = new BehaviorAggregator();

    aggregator.record(zeid, createObservation({ param: 30 }));
    aggregator.record(zeid, createObservation({ param: 42 }));
    aggregator.record(zeid, createObservation({ param: 42 }));

    expect(aggregator.snapshot("trust:Zeid II")?.weaponSkills.map((entry) => entry.id)).toEqual([
      42, 30,
    ]);
  });

  it("creates empty profiles on demand and clears on reset", () => {
    const aggregator = new BehaviorAggregator();

    const profile = aggregator.ensureProfile(zeid);

    expect(aggregator.ensureProfile(zeid)).toBe(profile);
    expect(aggregator.findProfile({ kind: "trust", name: "Zeid II" })).toBe(profile);
    expect(profile.totalSamples).toBe(0);

    aggregator.reset();
    expect(aggregator.size).toBe(0);
    expect(aggregator.getProfile("trust:Zeid II")).toBeUndefined();
  });
});
