import { describe, expect, it } from "vitest";
import { decodeActionPacket, type ActionEffect, type ActionTarget } from "./action-packet";
import { encodeActionPacket } from "./action-packet-encoder";

const createAction = (overrides: Partial<ActionEffect> = {}): ActionEffect => ({
  reaction: 1,
  animation: 63,
  effectFlag: 0,
  stagger: 0,
  knockback: 0,
  magnitude: 450,
  message: 185,
  ...overrides,
});

const createTargets = (count: number, actionsPerTarget = 1): ActionTarget[] =>
  Array.from({ length: count }, (_, index) => ({
    id: 0x01_00_20_00 + index,
    actions: Array.from({ length: actionsPerTarget }, () => createAction()),
  }));

describe("decodeActionPacket", () => {
  it("decodes the header, targets and action fields", () => {
    const packet = encodeActionPacket({
      actorId: 0x01_00_12_34,
      category: 3,
      param: 30,
      recast: 5,
      targets: [
        {
          id: 0x01_00_20_00,
          actions: [createAction({ stagger: 2, knockback: 1 })],
        },
      ],
    });

    const result = decodeActionPacket(packet);

    expect(result).toEqual({
      ok: true,
      action: {
        actorId: 0x01_00_12_34,
        category: 3,
        param: 30,
        recast: 5,
        targets: [
          {
            id: 0x01_00_20_00,
            actions: [
              {
                reaction: 1,
                animation: 63,
                effectFlag: 0,
                stagger: 2,
                knockback: 1,
                magnitude: 450,
                message: 185,
              },
            ],
          },
        ],
      },
    });
  });

  it("lays out the actor id and the first packed fields on the wire", () => {
    const packet = encodeActionPacket({
      actorId: 0x01_00_12_34,
      category: 3,
      param: 30,
      targets: createTargets(1),
    });

    expect(packet.length).toBe(32);
    expect([...packet.subarray(0, 2)]).toEqual([0x28, 16]);
    expect([...packet.subarray(4, 8)]).toEqual([0x34, 0x12, 0x00, 0x01]);
    expect([...packet.subarray(8, 11)]).toEqual([0x01, 0x8c, 0x07]);
  });

  it("reads the actor id relative to the view's byte offset", () => {
    const packet = encodeActionPacket({
      actorId: 77,
      category: 1,
      param: 0,
      targets: createTargets(1),
    });
    const backing = new Uint8Array(packet.length + 3);
    backing.set(packet, 3);

    const result = decodeActionPacket(backing.subarray(3));

    expect(result.ok && result.action.actorId).toBe(77);
  });

  it("rejects buffers under 10 bytes", () => {
    expect(decodeActionPacket(new Uint8Array(9))).toEqual({
      ok: false,
      error: {
        reason: "too_short",
        message: "Action packet is 9 bytes; at least 10 required.",
      },
    });
  });

  it("decodes a truncated tail with missing bits as zero", () => {
    const buffer = new Uint8Array(10);
    buffer[4] = 0x05;
    buffer[8] = 0x01;

    expect(decodeActionPacket(buffer)).toEqual({
      ok: true,
      action: {
        actorId: 5,
        category: 0,
        param: 0,
        recast: 0,
        targets: [{ id: 0, actions: [] }],
      },
    });
  });

  it("enforces target count boundaries", () => {
    const decodeTargets = (count: number) =>
      decodeActionPacket(
        encodeActionPacket({ actorId: 1, category: 1, param: 0, targets: createTargets(count) }),
      );

    expect(decodeTargets(0)).toEqual({
      ok: false,
      error: { reason: "no_targets", message: "Action packet declares no targets." },
    });

    const sixteen = decodeTargets(16);
    expect(sixteen.ok).toBe(true);
    if (sixteen.ok) {
      expect(sixteen.action.targets).toHaveLength(16);
      expect(sixteen.action.targets[15]?.id).toBe(0x01_00_20_0f);
    }

    expect(decodeTargets(17)).toEqual({
      ok: false,
      error: {
        reason: "too_many_targets",
        message: "Action packet declares 17 targets; at most 16 allowed.",
      },
    });
  });

  it("enforces action count boundaries", () => {
    const eight = decodeActionPacket(
      encodeActionPacket({ actorId: 1, category: 1, param: 0, targets: createTargets(1, 8) }),
    );
    expect(eight.ok).toBe(true);
    if (eight.ok) {
      expect(eight.action.targets[0]?.actions).toHaveLength(8);
    }

    const nine = decodeActionPacket(
      encodeActionPacket({ actorId: 1, category: 1, param: 0, targets: createTargets(1, 9) }),
    );
    expect(nine).toEqual({
      ok: false,
      error: {
        reason: "too_many_actions",
        message: "Target 16785408 declares 9 actions; at most 8 allowed.",
      },
    });
  });

  it("fails the whole packet when a later target is invalid", () => {
    const targets = createTargets(2);
    targets[1] = {
      id: 99,
      actions: Array.from({ length: 9 }, () => createAction()),
    };

    const result = decodeActionPacket(
      encodeActionPacket({ actorId: 1, category: 1, param: 0, targets }),
    );

    expect(result.ok).toBe(false);
    expect("action" in result).toBe(false);
  });

  it("omits the additional effect when the effect flag is zero", () => {
    const result = decodeActionPacket(
      encodeActionPacket({ actorId: 1, category: 1, param: 0, targets: createTargets(1) }),
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.action.targets[0]?.actions[0]?.additionalEffect).toBeUndefined();
    }
  });

  it("decodes an additional effect without a spike", () => {
    const additionalEffect = { animation: 163, spikeFlag: 0, magnitude: 38, message: 163 };
    const result = decodeActionPacket(
      encodeActionPacket({
        actorId: 1,
        category: 1,
        param: 0,
        targets: [{ id: 2, actions: [createAction({ effectFlag: 3, additionalEffect })] }],
      }),
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      const decoded = result.action.targets[0]?.actions[0]?.additionalEffect;
      expect(decoded).toEqual(additionalEffect);
      expect(decoded?.spike).toBeUndefined();
    }
  });

  it("decodes all three nesting levels", () => {
    const spike = { animation: 42, effectKind: 1, magnitude: 16_383, message: 44 };
    const additionalEffect = {
      animation: 1023,
      spikeFlag: 2,
      magnitude: 131_071,
      message: 1023,
      spike,
    };
    const result = decodeActionPacket(
      encodeActionPacket({
        actorId: 0xff_ff_ff_ff,
        category: 15,
        param: 65_535,
        targets: [
          {
            id: 3,
            actions: [
              createAction({ effectFlag: 15, animation: 4095, magnitude: 131_071, additionalEffect }),
              createAction(),
            ],
          },
        ],
      }),
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.action.actorId).toBe(4_294_967_295);
      expect(result.action.param).toBe(65_535);
      const [first, second] = result.action.targets[0]?.actions ?? [];
      expect(first?.animation).toBe(4095);
      expect(first?.additionalEffect).toEqual(additionalEffect);
      expect(second).toEqual(createAction());
    }
  });
});

describe("encodeActionPacket", () => {
  it("rejects inconsistent effect flags", () => {
    expect(() =>
      encodeActionPacket({
        actorId: 1,
        category: 1,
        param: 0,
        targets: [{ id: 1, actions: [createAction({ effectFlag: 1 })] }],
      }),
    ).toThrow(RangeError);
  });

  it("writes the sequence number into the header", () => {
    const packet = encodeActionPacket(
      { actorId: 1, category: 1, param: 0, targets: createTargets(1) },
      { sequence: 0x1234 },
    );

    expect([...packet.subarray(2, 4)]).toEqual([0x34, 0x12]);
  });

  it("rejects packets too large for the size field", () => {
    const largest = encodeActionPacket({
      actorId: 1,
      category: 1,
      param: 0,
      targets: createTargets(16, 2),
    });

    expect(largest).toHaveLength(444);
    expect(largest[1]).toBe(222);
    expect(() =>
      encodeActionPacket({ actorId: 1, category: 1, param: 0, targets: createTargets(16, 3) }),
    ).toThrow("Action packet needs 620 bytes; the size field holds at most 508.");
  });
});
