import { readFile } from "node:fs/promises";
import { ActionCategory, type CompletionCategory } from "@actionscope/protocol";

/**
 * Maps an action's category and param to a display name.
 */
export interface NameResolver {
  resolve(category: CompletionCategory, param: number): string | undefined;
}

/**
 * Id → name tables, keyed by the param as a decimal string.
 */
export interface ResourceTables {
  weaponSkills?: Record<string, string>;
  spells?: Record<string, string>;
  jobAbilities?: Record<string, string>;
  monsterAbilities?: Record<string, string>;
}

export type ResourceTableName = keyof ResourceTables;

const RESOURCE_TABLE_NAMES: readonly ResourceTableName[] = [
  "weaponSkills",
  "spells",
  "jobAbilities",
  "monsterAbilities",
];

// Dances, runes and pet abilities live in the job ability table.
const TABLE_BY_CATEGORY: Record<CompletionCategory, ResourceTableName | undefined> = {
  [ActionCategory.Melee]: undefined,
  [ActionCategory.Ranged]: undefined,
  [ActionCategory.WeaponSkill]: "weaponSkills",
  [ActionCategory.Magic]: "spells",
  [ActionCategory.Item]: undefined,
  [ActionCategory.JobAbility]: "jobAbilities",
  [ActionCategory.Unassigned]: undefined,
  [ActionCategory.MonsterAbility]: "monsterAbilities",
  [ActionCategory.PetAbility]: "jobAbilities",
  [ActionCategory.Dance]: "jobAbilities",
  [ActionCategory.Rune]: "jobAbilities",
};

export const EMPTY_NAME_RESOLVER: NameResolver = {
  resolve: () => undefined,
};

export const createTableNameResolver = (tables: ResourceTables): NameResolver => ({
  resolve(category, param) {
    const tableName = TABLE_BY_CATEGORY[category];
    if (!tableName) {
      return undefined;
    }
    return tables[tableName]?.[String(param)];
  },
});

/**
 * Resolves a name, or a deterministic `Unknown_<tag>_<param>` placeholder when
 * no table has the id.
 */
export const resolveActionName = (
  names: NameResolver,
  category: CompletionCategory,
  param: number,
  tag: string,
): string => names.resolve(category, param) ?? `Unknown_${tag}_${param}`;

export type ParseResourceTablesResult =
  | { ok: true; tables: ResourceTables }
  | { ok: false; error: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parses and validates a serialized resource table payload.
 */
export const parseResourceTables = (raw: string): ParseResourceTablesResult => {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { ok: false, error: "Resource tables are not valid JSON." };
  }

  if (!isRecord(value)) {
    return { ok: false, error: "Resource tables must be an object." };
  }

  const tables: ResourceTables = {};
  for (const tableName of RESOURCE_TABLE_NAMES) {
    const table = value[tableName];
    if (table === undefined) {
      continue;
    }
    if (!isRecord(table)) {
      return { ok: false, error: `Resource table ${tableName} must be an object.` };
    }

    const entries: Record<string, string> = {};
    for (const [param, name] of Object.entries(table)) {
      if (typeof name !== "string") {
        return {
          ok: false,
          error: `Resource table ${tableName} entry ${param} must be a string.`,
        };
      }
      entries[param] = name;
    }
    tables[tableName] = entries;
  }

  return { ok: true, tables };
};

export const loadResourceTables = async (filePath: string): Promise<ResourceTables> => {
  const raw = await readFile(filePath, "utf8");
  const parsed = parseResourceTables(raw);
  if (!parsed.ok) {
    throw new Error(`Failed to load resource tables from ${filePath}: ${parsed.error}`);
  }
  return parsed.tables;
};
