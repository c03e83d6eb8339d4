import { brickName, formatFixed, roundHalfEven } from "./naming";

describe("roundHalfEven", () => {
  it("rounds exact halves to the even neighbour", () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
  });

  it("rounds everything else to nearest", () => {
    expect(roundHalfEven(1.4999)).toBe(1);
    expect(roundHalfEven(1.5001)).toBe(2);
    expect(roundHalfEven(7)).toBe(7);
  });
});

describe("formatFixed", () => {
  it("zero-pads to the requested width", () => {
    expect(formatFixed(1250, 7)).toBe("0001250");
    expect(formatFixed(0, 6)).toBe("000000");
  });

  it("does not truncate wider numbers", () => {
    expect(formatFixed(1234567.4, 6)).toBe("1234567");
  });
});

describe("brickName", () => {
  it("encodes the brick at the origin", () => {
    expect(brickName(0.125, 0)).toBe("0001p000");
  });

  it("uses m for negative Dec", () => {
    expect(brickName(359.875, -0.25)).toBe("3598m002");
  });

  it("names the polar caps", () => {
    expect(brickName(180, 90)).toBe("1800p900");
    expect(brickName(180, -90)).toBe("1800m900");
  });

  it("absorbs floating-point noise in the center", () => {
    expect(brickName(39.599999999999994, 10)).toBe("0396p100");
  });

  it("always produces 8 characters", () => {
    for (const [ra, dec] of [[0.001, 0.001], [359.999, -89.9], [45, 45]]) {
      expect(brickName(ra, dec)).toHaveLength(8);
    }
  });
});
