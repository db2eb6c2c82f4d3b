import { parseStockInputs } from "./schema";
import { ConfigurationError } from "../util/errors";

describe("parseStockInputs", () => {
  it("parses snapshots and fills headline defaults", () => {
    const [stock] = parseStockInputs([
      {
        snapshot: { ticker: "mema", lookbackDays: 120, indicators: { rsi_14: 71, ret_21d: null } },
        headlines: { totalHeadlines: 6, positiveHeadlines: 2 },
      },
    ]);
    expect(stock.snapshot).toEqual({
      ticker: "MEMA",
      lookbackDays: 120,
      indicators: { rsi_14: 71, ret_21d: null },
    });
    expect(stock.headlines).toEqual({
      totalHeadlines: 6,
      positiveHeadlines: 2,
      newsRiskScore: 0,
      capexMentions: 0,
      positiveOutcomes: [],
    });
  });

  it("allows stocks without headlines", () => {
    const [stock] = parseStockInputs([{ snapshot: { ticker: "A", lookbackDays: 10, indicators: {} } }]);
    expect(stock.headlines).toBeUndefined();
  });

  it("rejects more positive than total headlines", () => {
    expect(() =>
      parseStockInputs([
        {
          snapshot: { ticker: "A", lookbackDays: 10, indicators: {} },
          headlines: { totalHeadlines: 1, positiveHeadlines: 3 },
        },
      ])
    ).toThrow(
      "Invalid stock inputs: 0.headlines.positiveHeadlines: positiveHeadlines cannot exceed totalHeadlines"
    );
  });

  it("rejects unknown indicators", () => {
    expect(() =>
      parseStockInputs([
        { snapshot: { ticker: "A", lookbackDays: 10, indicators: { rsi_99: 50 } } },
      ])
    ).toThrow(ConfigurationError);
  });
});
