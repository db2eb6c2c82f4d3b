import {
  parseBucketLimits,
  parsePositions,
  withWeightsFromMarketValue,
} from "./schema";
import { ConfigurationError } from "../util/errors";

describe("parsePositions", () => {
  it("normalizes tickers and fills defaults", () => {
    const [parsed] = parsePositions([
      { ticker: " mema ", marketValue: 1000, weight: 0.1, bucket: "Memory", storyTags: ["AI", "AI", "HBM"] },
    ]);
    expect(parsed).toEqual({
      ticker: "MEMA",
      marketValue: 1000,
      weight: 0.1,
      bucket: "Memory",
      profile: "unknown",
      storyTags: ["AI", "HBM"],
    });
  });

  it("reports every invalid field", () => {
    let caught: unknown;
    try {
      parsePositions([{ ticker: "", marketValue: 10, weight: -0.1, bucket: "Memory" }]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.message.startsWith("Invalid positions: ")).toBe(true);
      expect(caught.details.map(d => d.split(":")[0])).toEqual(["0.ticker", "0.weight"]);
    }
  });
});

describe("parseBucketLimits", () => {
  it("accepts fractions", () => {
    expect(parseBucketLimits({ Memory: 0.2, Cash: 1 })).toEqual({ Memory: 0.2, Cash: 1 });
  });

  it("rejects limits outside 0-1", () => {
    expect(() => parseBucketLimits({ Memory: 2 })).toThrow(ConfigurationError);
  });
});

describe("withWeightsFromMarketValue", () => {
  it("derives weights from market values", () => {
    const positions = withWeightsFromMarketValue([
      { ticker: "A", marketValue: 300, bucket: "Memory", profile: "x", storyTags: [] },
      { ticker: "CASH", marketValue: 100, bucket: "Cash", profile: "cash", storyTags: [] },
    ]);
    expect(positions.map(p => p.weight)).toEqual([0.75, 0.25]);
  });

  it("leaves weights at zero for an empty book", () => {
    const positions = withWeightsFromMarketValue([
      { ticker: "A", marketValue: 0, bucket: "Memory", profile: "x", storyTags: [] },
    ]);
    expect(positions[0].weight).toBe(0);
  });
});
