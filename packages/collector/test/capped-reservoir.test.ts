import { describe, expect, it } from "vitest";
import { CappedReservoir } from "../src/aggregation/capped-reservoir";

describe("CappedReservoir", () => {
  it("keeps the first samples and drops the rest once full", () => {
    const reservoir = new CappedReservoir<number>(3);

    const accepted = [1, 2, 3, 4, 5].map((value) => reservoir.append(value));

    expect(accepted).toEqual([true, true, true, false, false]);
    expect(reservoir.toArray()).toEqual([1, 2, 3]);
    expect(reservoir.isFull).toBe(true);
  });

  it("returns a copy from toArray", () => {
    const reservoir = new CappedReservoir<number>(2);
    reservoir.append(7);

    reservoir.toArray().push(8);

    expect(reservoir.length).toBe(1);
  });

  it("rejects non-positive capacities", () => {
    expect(() => new CappedReservoir<number>(0)).toThrow(
      "CappedReservoir capacity must be a positive integer.",
    );
  });
});
