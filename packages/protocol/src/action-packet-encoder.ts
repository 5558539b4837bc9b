import type { ActionEffect, ActionTarget, AdditionalEffect, DecodedAction } from "./action-packet";
import { BitStreamWriter } from "./bit-stream-writer";
import {
  ACTION_EFFECT_BITS,
  ACTION_HEADER_BITS,
  ACTION_PACKET_ID,
  ACTION_TARGET_BITS,
  ADDITIONAL_EFFECT_BITS,
  PACKET_HEADER_LENGTH,
  PACKET_MAX_WORDS,
  SPIKE_EFFECT_BITS,
} from "./constants";
import { fitsInBits } from "./utils/number";

export type ActionPacketInput = Omit<DecodedAction, "recast"> & { recast?: number };

export interface EncodeActionPacketOptions {
  /** Packet sequence number written to header bytes 2-3. */
  sequence?: number;
}

const writeAdditionalEffect = (writer: BitStreamWriter, effect: AdditionalEffect): void => {
  writer.write(effect.animation, ADDITIONAL_EFFECT_BITS.animation);
  writer.write(effect.spikeFlag, ADDITIONAL_EFFECT_BITS.spikeFlag);
  writer.write(effect.magnitude, ADDITIONAL_EFFECT_BITS.magnitude);
  writer.write(effect.message, ADDITIONAL_EFFECT_BITS.message);

  if (effect.spikeFlag === 0) {
    if (effect.spike) {
      throw new RangeError("Spike effect present but spikeFlag is 0.");
    }
    return;
  }
  if (!effect.spike) {
    throw new RangeError(`spikeFlag is ${effect.spikeFlag} but no spike effect was given.`);
  }
  writer.write(effect.spike.animation, SPIKE_EFFECT_BITS.animation);
  writer.write(effect.spike.effectKind, SPIKE_EFFECT_BITS.effectKind);
  writer.write(effect.spike.magnitude, SPIKE_EFFECT_BITS.magnitude);
  writer.write(effect.spike.message, SPIKE_EFFECT_BITS.message);
};

const writeActionEffect = (writer: BitStreamWriter, action: ActionEffect): void => {
  writer.write(action.reaction, ACTION_EFFECT_BITS.reaction);
  writer.write(action.animation, ACTION_EFFECT_BITS.animation);
  writer.write(action.effectFlag, ACTION_EFFECT_BITS.effectFlag);
  writer.write(action.stagger, ACTION_EFFECT_BITS.stagger);
  writer.write(action.knockback, ACTION_EFFECT_BITS.knockback);
  writer.write(action.magnitude, ACTION_EFFECT_BITS.magnitude);
  writer.write(action.message, ACTION_EFFECT_BITS.message);
  writer.skip(ACTION_EFFECT_BITS.unused);

  if (action.effectFlag === 0) {
    if (action.additionalEffect) {
      throw new RangeError("Additional effect present but effectFlag is 0.");
    }
    return;
  }
  if (!action.additionalEffect) {
    throw new RangeError(`effectFlag is ${action.effectFlag} but no additional effect was given.`);
  }
  writeAdditionalEffect(writer, action.additionalEffect);
};

const writeTarget = (writer: BitStreamWriter, target: ActionTarget): void => {
  writer.write(target.id, ACTION_TARGET_BITS.id);
  writer.write(target.actions.length, ACTION_TARGET_BITS.actionCount);
  for (const action of target.actions) {
    writeActionEffect(writer, action);
  }
};

/**
 * Builds a raw action packet, header included, padded to a 4-byte boundary.
 *
 * Counts are written as given, so packets the decoder rejects (no targets,
 * 17 targets, 9 actions) can be produced as well. Every field must fit its width.
 */
export const encodeActionPacket = (
  action: ActionPacketInput,
  options: EncodeActionPacketOptions = {},
): Uint8Array => {
  if (!fitsInBits(action.actorId, 32)) {
    throw new RangeError(`Actor id ${action.actorId} does not fit in 32 bits.`);
  }
  const sequence = options.sequence ?? 0;
  if (!fitsInBits(sequence, 16)) {
    throw new RangeError(`Sequence ${sequence} does not fit in 16 bits.`);
  }

  const writer = new BitStreamWriter();
  writer.write(action.targets.length, ACTION_HEADER_BITS.targetCount);
  writer.write(action.category, ACTION_HEADER_BITS.category);
  writer.write(action.param, ACTION_HEADER_BITS.param);
  writer.write(action.recast ?? 0, ACTION_HEADER_BITS.recast);
  for (const target of action.targets) {
    writeTarget(writer, target);
  }
  const body = writer.toBytes();

  const unpaddedLength = PACKET_HEADER_LENGTH + 4 + body.length;
  const words = Math.ceil(unpaddedLength / 4);
  if (words > PACKET_MAX_WORDS) {
    throw new RangeError(
      `Action packet needs ${words * 4} bytes; the size field holds at most ${PACKET_MAX_WORDS * 4}.`,
    );
  }
  const packet = new Uint8Array(words * 4);
  const view = new DataView(packet.buffer);

  // Header: 9-bit id, 7-bit size in 4-byte words, 16-bit sequence.
  view.setUint8(0, ACTION_PACKET_ID & 0xff);
  view.setUint8(1, ((words & PACKET_MAX_WORDS) << 1) | ((ACTION_PACKET_ID >> 8) & 0x01));
  view.setUint16(2, sequence, true);
  view.setUint32(PACKET_HEADER_LENGTH, action.actorId, true);
  packet.set(body, PACKET_HEADER_LENGTH + 4);

  return packet;
};
