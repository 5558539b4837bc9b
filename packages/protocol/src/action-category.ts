/**
 * Action categories carried in the 4-bit category field of an action packet.
 */
export enum ActionCategory {
  Melee = 1,
  Ranged = 2,
  WeaponSkill = 3,
  Magic = 4,
  Item = 5,
  JobAbility = 6,
  WeaponSkillReadying = 7,
  CastingStart = 8,
  ItemStart = 9,
  Unassigned = 10,
  MonsterAbility = 11,
  RangedStart = 12,
  PetAbility = 13,
  Dance = 14,
  Rune = 15,
}

/**
 * Categories that announce an action rather than complete it.
 */
export type AnnouncementCategory =
  | ActionCategory.WeaponSkillReadying
  | ActionCategory.CastingStart
  | ActionCategory.ItemStart
  | ActionCategory.RangedStart;

export type CompletionCategory = Exclude<ActionCategory, AnnouncementCategory>;

export type CategoryDisposition =
  | { kind: "completion"; category: CompletionCategory }
  | { kind: "announcement"; category: AnnouncementCategory }
  | { kind: "unrecognized"; raw: number };

export const CATEGORY_NAMES: Record<ActionCategory, string> = {
  [ActionCategory.Melee]: "melee",
  [ActionCategory.Ranged]: "ranged",
  [ActionCategory.WeaponSkill]: "weapon_skill",
  [ActionCategory.Magic]: "magic",
  [ActionCategory.Item]: "item",
  [ActionCategory.JobAbility]: "job_ability",
  [ActionCategory.WeaponSkillReadying]: "ws_readying",
  [ActionCategory.CastingStart]: "casting",
  [ActionCategory.ItemStart]: "item_start",
  [ActionCategory.Unassigned]: "unassigned",
  [ActionCategory.MonsterAbility]: "monster_ability",
  [ActionCategory.RangedStart]: "ranged_start",
  [ActionCategory.PetAbility]: "pet_ability",
  [ActionCategory.Dance]: "dance",
  [ActionCategory.Rune]: "rune",
};

const CATEGORY_BY_CODE: ReadonlyMap<number, ActionCategory> = new Map(
  Object.values(ActionCategory)
    .filter((value): value is ActionCategory => typeof value === "number")
    .map((category) => [category, category]),
);

export const isAnnouncementCategory = (
  category: ActionCategory,
): category is AnnouncementCategory => {
  switch (category) {
    case ActionCategory.WeaponSkillReadying:
    case ActionCategory.CastingStart:
    case ActionCategory.ItemStart:
    case ActionCategory.RangedStart: {
      return true;
    }
    default: {
      return false;
    }
  }
};

/**
 * Maps a raw category code onto the closed set of known categories.
 */
export const classifyCategory = (raw: number): CategoryDisposition => {
  const category = CATEGORY_BY_CODE.get(raw);
  if (category === undefined) {
    return { kind: "unrecognized", raw };
  }
  if (isAnnouncementCategory(category)) {
    return { kind: "announcement", category };
  }
  return { kind: "completion", category };
};
