import { afterEach, describe, expect, it } from "vitest";
import {
  isSpecializationEnabled,
  setSpecializationEnabled,
  withSpecializationDisabled,
} from "../../src/core/construct/specialization";

describe("specialization switch", () => {
  afterEach(() => {
    setSpecializationEnabled(true);
  });

  it("is disabled inside the guard and restored after it", () => {
    const inside = withSpecializationDisabled(() => isSpecializationEnabled());

    expect(inside).toBe(false);
    expect(isSpecializationEnabled()).toBe(true);
  });

  it("restores the prior value when the guarded function throws", () => {
    expect(() =>
      withSpecializationDisabled(() => {
        throw new Error("restore failed");
      })
    ).toThrow("restore failed");
    expect(isSpecializationEnabled()).toBe(true);
  });

  it("keeps a prior disabled state through nested guards", () => {
    setSpecializationEnabled(false);

    withSpecializationDisabled(() => withSpecializationDisabled(() => undefined));

    expect(isSpecializationEnabled()).toBe(false);
  });

  it("returns the previous value when set", () => {
    expect(setSpecializationEnabled(false)).toBe(true);
    expect(setSpecializationEnabled(true)).toBe(false);
  });
});
