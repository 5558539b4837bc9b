/**
 * Who a behavior profile belongs to. Trusts are keyed by name alone; mobs by
 * zone and name, so same-named mobs in one zone share a profile.
 */
export type ProfileIdentity =
  | { kind: "trust"; name: string }
  | { kind: "mob"; zone: string; name: string };

export type ProfileOwner = ProfileIdentity & { modelId: number };

// Escapes the key separator so zone and name segments cannot run together.
const escapeKeySegment = (segment: string): string =>
  segment.replaceAll("%", "%25").replaceAll(":", "%3A");

export const buildProfileKey = (identity: ProfileIdentity): string =>
  identity.kind === "trust"
    ? `trust:${escapeKeySegment(identity.name)}`
    : `mob:${escapeKeySegment(identity.zone)}:${escapeKeySegment(identity.name)}`;

export type MobOwner = Extract<ProfileOwner, { kind: "mob" }>;

export type TrustOwner = Extract<ProfileOwner, { kind: "trust" }>;

interface RegisteredEntity {
  name: string;
  modelId: number;
  zone: string;
}

export const trustOwnerOf = (entity: RegisteredEntity): TrustOwner => ({
  kind: "trust",
  name: entity.name,
  modelId: entity.modelId,
});

export const mobOwnerOf = (entity: RegisteredEntity): MobOwner => ({
  kind: "mob",
  zone: entity.zone,
  name: entity.name,
  modelId: entity.modelId,
});
