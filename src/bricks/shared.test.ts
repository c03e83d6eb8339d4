import { brickname, clearSharedBricks, sharedBricks } from "./shared";
import { ConfigurationError } from "./errors";

afterEach(() => {
  clearSharedBricks();
});

describe("sharedBricks", () => {
  it("reuses one index for the same size", () => {
    const a = sharedBricks();
    expect(a.bricksize).toBe(0.25);
    expect(sharedBricks(0.25)).toBe(a);
  });

  it("replaces the index when the size changes", () => {
    const a = sharedBricks(1);
    const b = sharedBricks(2);
    expect(b).not.toBe(a);
    expect(b.bricksize).toBe(2);
    expect(sharedBricks(2)).toBe(b);
  });

  it("rebuilds after being cleared", () => {
    const a = sharedBricks(1);
    clearSharedBricks();
    expect(sharedBricks(1)).not.toBe(a);
  });

  it("keeps the previous index when the new size is invalid", () => {
    const a = sharedBricks(1);
    expect(() => sharedBricks(0)).toThrow(ConfigurationError);
    expect(sharedBricks(1)).toBe(a);
  });
});

describe("brickname", () => {
  it("names a single coordinate with the default size", () => {
    expect(brickname(0, 0)).toBe("0001p000");
    expect(brickname(180, 0.1)).toBe("1801p000");
  });

  it("names a batch", () => {
    expect(brickname([0, 180], [0, 0])).toEqual(["0001p000", "1801p000"]);
  });

  it("honours the brick size", () => {
    expect(brickname(10, 0, 90)).toBe("0450p000");
    expect(sharedBricks(90).bricksize).toBe(90);
  });
});
