// Action packet (0x028) layout constants
// Offsets are 0-based byte offsets into the raw packet, header included.

export const ACTION_PACKET_ID = 0x028;
export const PACKET_HEADER_LENGTH = 4;
export const PACKET_MAX_WORDS = 0x7f; // 7-bit size field, in 4-byte words
export const ACTION_PACKET_MIN_LENGTH = 10;
export const ACTION_PACKET_ACTOR_OFFSET = 4;
export const ACTION_PACKET_BITS_OFFSET = 8;

// Count limits
export const MAX_ACTION_TARGETS = 16;
export const MAX_TARGET_ACTIONS = 8;

// Field widths in bits, in wire order.
export const ACTION_HEADER_BITS = {
  targetCount: 10,
  category: 4,
  param: 16,
  recast: 16,
} as const;

export const ACTION_TARGET_BITS = {
  id: 32,
  actionCount: 4,
} as const;

export const ACTION_EFFECT_BITS = {
  reaction: 5,
  animation: 12,
  effectFlag: 4,
  stagger: 7,
  knockback: 3,
  magnitude: 17,
  message: 10,
  unused: 31,
} as const;

export const ADDITIONAL_EFFECT_BITS = {
  animation: 10,
  spikeFlag: 4,
  magnitude: 17,
  message: 10,
} as const;

export const SPIKE_EFFECT_BITS = {
  animation: 10,
  effectKind: 4,
  magnitude: 14,
  message: 10,
} as const;
