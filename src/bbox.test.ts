import { bboxParam, enclose, isValidBBox, parseBBox } from "./bbox.js";

describe("isValidBBox", () => {
  it("accepts min <= max on both axes", () => {
    expect(isValidBBox([-106.6, 25.8, -93.5, 31.8])).toBe(true);
    expect(isValidBBox([1, 1, 1, 1])).toBe(true);
  });

  it("rejects inverted axes", () => {
    expect(isValidBBox([5, 0, 1, 1])).toBe(false);
    expect(isValidBBox([0, 5, 1, 1])).toBe(false);
  });

  it("rejects wrong length and non-finite values", () => {
    expect(isValidBBox([0, 0, 1])).toBe(false);
    expect(isValidBBox([0, 0, 1, NaN])).toBe(false);
    expect(isValidBBox([0, 0, Infinity, 1])).toBe(false);
  });
});

describe("parseBBox", () => {
  it("parses comma-separated numbers", () => {
    expect(parseBBox("-106.6, 25.8, -93.5, 31.8")).toEqual([-106.6, 25.8, -93.5, 31.8]);
  });

  it("throws on garbage", () => {
    expect(() => parseBBox("a,b,c,d")).toThrow(/Invalid bounding box/);
  });
});

describe("bboxParam", () => {
  it("joins with commas", () => {
    expect(bboxParam([-106.6, 25.8, -93.5, 31.8])).toBe("-106.6,25.8,-93.5,31.8");
  });
});

describe("enclose", () => {
  it("returns the extent of all positions", () => {
    expect(enclose([[1, 5], [-3, 2], [4, -1]])).toEqual([-3, -1, 4, 5]);
  });

  it("returns null for no positions", () => {
    expect(enclose([])).toBeNull();
  });
});
