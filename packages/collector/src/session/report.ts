import type {
  AdditionalEffectSnapshot,
  AnimationSnapshot,
  CounterSnapshot,
  ProfileSnapshot,
} from "../aggregation/snapshot";

const RULE = "==========================";

export const formatAnimationId = (animationId: number): string =>
  `0x${animationId.toString(16).toUpperCase().padStart(3, "0")}`;

const labelOf = (profile: ProfileSnapshot): string =>
  profile.zone === undefined ? profile.name : `${profile.name} (${profile.zone})`;

/**
 * One line per profile, sorted by label, with distinct ability counts.
 */
export const formatSummary = (profiles: ProfileSnapshot[]): string[] => {
  if (profiles.length === 0) {
    return ["No behavior data collected yet."];
  }

  const lines = ["=== Behavior Data Summary ===", `Profiles tracked: ${profiles.length}`, ""];
  const sorted = [...profiles].sort((a, b) => labelOf(a).localeCompare(labelOf(b)));

  for (const profile of sorted) {
    const parts: string[] = [];
    if (profile.weaponSkills.length > 0) {
      parts.push(`${profile.weaponSkills.length} WS`);
    }
    if (profile.spells.length > 0) {
      parts.push(`${profile.spells.length} spells`);
    }
    if (profile.jobAbilities.length > 0) {
      parts.push(`${profile.jobAbilities.length} JA`);
    }
    if (profile.monsterAbilities.length > 0) {
      parts.push(`${profile.monsterAbilities.length} mob abilities`);
    }
    const detail = parts.length > 0 ? ` [${parts.join(", ")}]` : "";
    const status =
      profile.totalSamples > 0 ? `${profile.totalSamples} actions` : "waiting...";
    lines.push(`  ${labelOf(profile)}: ${status}${detail}`);
  }

  lines.push(RULE);
  return lines;
};

const counterLines = (title: string, counters: CounterSnapshot[]): string[] => {
  if (counters.length === 0) {
    return [];
  }
  return [
    `${title}:`,
    ...counters.map(
      (entry) =>
        `  ${entry.name} [ID:${entry.id} Anim:${formatAnimationId(entry.animationId)} x${entry.count}]`,
    ),
  ];
};

const animationLines = (title: string, counters: AnimationSnapshot[]): string[] => {
  if (counters.length === 0) {
    return [];
  }
  return [
    `${title}:`,
    ...counters.map((entry) => `  Anim:${formatAnimationId(entry.animationId)} x${entry.count}`),
  ];
};

const additionalEffectLines = (effects: AdditionalEffectSnapshot[]): string[] => {
  if (effects.length === 0) {
    return [];
  }
  return [
    "Additional Effects:",
    ...effects.map(
      (effect) =>
        `  Anim:${formatAnimationId(effect.animation)} Param:${effect.magnitude}` +
        ` Msg:${effect.message} x${effect.count} (from ${effect.sourceCategory})`,
    ),
  ];
};

/**
 * Finds a profile by exact name, then by case-insensitive name or substring.
 */
export const findProfileByName = (
  profiles: ProfileSnapshot[],
  search: string,
): ProfileSnapshot | undefined => {
  const exact = profiles.find((profile) => profile.name === search);
  if (exact) {
    return exact;
  }
  const lower = search.toLowerCase();
  return profiles.find((profile) => {
    const name = profile.name.toLowerCase();
    return name === lower || name.includes(lower);
  });
};

export const formatDetail = (profiles: ProfileSnapshot[], search: string): string[] => {
  const profile = findProfileByName(profiles, search);
  if (!profile) {
    return [`No data for: ${search}`];
  }

  const lines = [
    `=== ${labelOf(profile)} ===`,
    `Model ID: ${profile.modelId}`,
    `Total actions: ${profile.totalSamples}`,
    "",
    ...counterLines("Weapon Skills", profile.weaponSkills),
    ...counterLines("Spells", profile.spells),
    ...counterLines("Job Abilities", profile.jobAbilities),
    ...counterLines("Dances", profile.dances),
    ...counterLines("Runes", profile.runes),
    ...counterLines("Monster Abilities", profile.monsterAbilities),
    ...counterLines("Pet Abilities", profile.petAbilities),
    ...animationLines("Melee Animations", profile.meleeAnimations),
    ...animationLines("Ranged Animations", profile.rangedAnimations),
    ...additionalEffectLines(profile.additionalEffects),
  ];

  const damageTaken = profile.damageTaken;
  if (damageTaken && damageTaken.samples.length > 0) {
    lines.push(
      "Damage Taken:",
      `  Estimated HP: ${damageTaken.estimatedHp} (${damageTaken.samples.length} samples)`,
    );
  }

  lines.push(RULE);
  return lines;
};
