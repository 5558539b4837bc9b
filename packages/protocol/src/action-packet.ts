import { BitStreamReader } from "./bit-stream-reader";
import {
  ACTION_EFFECT_BITS,
  ACTION_HEADER_BITS,
  ACTION_PACKET_ACTOR_OFFSET,
  ACTION_PACKET_BITS_OFFSET,
  ACTION_PACKET_MIN_LENGTH,
  ACTION_TARGET_BITS,
  ADDITIONAL_EFFECT_BITS,
  MAX_ACTION_TARGETS,
  MAX_TARGET_ACTIONS,
  SPIKE_EFFECT_BITS,
} from "./constants";

export interface SpikeEffect {
  animation: number;
  effectKind: number;
  magnitude: number;
  message: number;
}

export interface AdditionalEffect {
  animation: number;
  /** Non-zero when a spike effect follows. */
  spikeFlag: number;
  magnitude: number;
  message: number;
  spike?: SpikeEffect;
}

export interface ActionEffect {
  reaction: number;
  animation: number;
  /** Non-zero when an additional effect follows. */
  effectFlag: number;
  stagger: number;
  knockback: number;
  /** Damage or healing amount. */
  magnitude: number;
  message: number;
  additionalEffect?: AdditionalEffect;
}

export interface ActionTarget {
  id: number;
  actions: ActionEffect[];
}

export interface DecodedAction {
  actorId: number;
  /** Raw 4-bit category code; see {@link classifyCategory}. */
  category: number;
  param: number;
  recast: number;
  targets: ActionTarget[];
}

export type DecodeFailureReason =
  | "too_short"
  | "no_targets"
  | "too_many_targets"
  | "too_many_actions";

export interface DecodeFailure {
  reason: DecodeFailureReason;
  message: string;
}

export type DecodeActionResult =
  | { ok: true; action: DecodedAction }
  | { ok: false; error: DecodeFailure };

const failure = (reason: DecodeFailureReason, message: string): DecodeActionResult => ({
  ok: false,
  error: { reason, message },
});

const readUint32LE = (buffer: Uint8Array, offset: number): number =>
  new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength).getUint32(offset, true);

const readSpikeEffect = (reader: BitStreamReader): SpikeEffect => ({
  animation: reader.read(SPIKE_EFFECT_BITS.animation),
  effectKind: reader.read(SPIKE_EFFECT_BITS.effectKind),
  magnitude: reader.read(SPIKE_EFFECT_BITS.magnitude),
  message: reader.read(SPIKE_EFFECT_BITS.message),
});

const readAdditionalEffect = (reader: BitStreamReader): AdditionalEffect => {
  const effect: AdditionalEffect = {
    animation: reader.read(ADDITIONAL_EFFECT_BITS.animation),
    spikeFlag: reader.read(ADDITIONAL_EFFECT_BITS.spikeFlag),
    magnitude: reader.read(ADDITIONAL_EFFECT_BITS.magnitude),
    message: reader.read(ADDITIONAL_EFFECT_BITS.message),
  };
  if (effect.spikeFlag !== 0) {
    effect.spike = readSpikeEffect(reader);
  }
  return effect;
};

const readActionEffect = (reader: BitStreamReader): ActionEffect => {
  const action: ActionEffect = {
    reaction: reader.read(ACTION_EFFECT_BITS.reaction),
    animation: reader.read(ACTION_EFFECT_BITS.animation),
    effectFlag: reader.read(ACTION_EFFECT_BITS.effectFlag),
    stagger: reader.read(ACTION_EFFECT_BITS.stagger),
    knockback: reader.read(ACTION_EFFECT_BITS.knockback),
    magnitude: reader.read(ACTION_EFFECT_BITS.magnitude),
    message: reader.read(ACTION_EFFECT_BITS.message),
  };
  reader.skip(ACTION_EFFECT_BITS.unused);

  if (action.effectFlag !== 0) {
    action.additionalEffect = readAdditionalEffect(reader);
  }
  return action;
};

/**
 * Decodes an action packet (0x028) into its actor, targets and per-target actions.
 *
 * Fields are read strictly left to right. A buffer shorter than the fixed prefix,
 * a target count outside [1, 16] or any target with more than 8 actions fails the
 * whole packet; no partially decoded record is returned.
 */
export const decodeActionPacket = (buffer: Uint8Array): DecodeActionResult => {
  if (buffer.length < ACTION_PACKET_MIN_LENGTH) {
    return failure(
      "too_short",
      `Action packet is ${buffer.length} bytes; at least ${ACTION_PACKET_MIN_LENGTH} required.`,
    );
  }

  const actorId = readUint32LE(buffer, ACTION_PACKET_ACTOR_OFFSET);
  const reader = new BitStreamReader(buffer, ACTION_PACKET_BITS_OFFSET);

  const targetCount = reader.read(ACTION_HEADER_BITS.targetCount);
  const category = reader.read(ACTION_HEADER_BITS.category);
  const param = reader.read(ACTION_HEADER_BITS.param);
  const recast = reader.read(ACTION_HEADER_BITS.recast);

  if (targetCount === 0) {
    return failure("no_targets", "Action packet declares no targets.");
  }
  if (targetCount > MAX_ACTION_TARGETS) {
    return failure(
      "too_many_targets",
      `Action packet declares ${targetCount} targets; at most ${MAX_ACTION_TARGETS} allowed.`,
    );
  }

  const targets: ActionTarget[] = [];
  for (let targetIndex = 0; targetIndex < targetCount; targetIndex += 1) {
    const id = reader.read(ACTION_TARGET_BITS.id);
    const actionCount = reader.read(ACTION_TARGET_BITS.actionCount);
    if (actionCount > MAX_TARGET_ACTIONS) {
      return failure(
        "too_many_actions",
        `Target ${id} declares ${actionCount} actions; at most ${MAX_TARGET_ACTIONS} allowed.`,
      );
    }

    const actions: ActionEffect[] = [];
    for (let actionIndex = 0; actionIndex < actionCount; actionIndex += 1) {
      actions.push(readActionEffect(reader));
    }
    targets.push({ id, actions });
  }

  return {
    ok: true,
    action: { actorId, category, param, recast, targets },
  };
};
