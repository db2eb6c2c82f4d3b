import {
  getBoolean,
  getEnvVar,
  getJson,
  getNumber,
  getStage,
  getString,
  isLocal,
  isTest,
} from "../../util/env";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with STAGE", () => {
    process.env.STAGE = "prod";
    expect(getStage()).toBe("prod");
  });

  test("stage fallback to NODE_ENV", () => {
    delete process.env.STAGE;
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
  });

  test("isLocal is false on CI runners", () => {
    delete process.env.STAGE;
    process.env.NODE_ENV = "development";
    process.env.CI = "true";
    expect(isLocal()).toBe(false);
    delete process.env.CI;
    expect(isLocal()).toBe(true);
  });

  test("isTest under jest", () => {
    expect(isTest()).toBe(true);
  });

  test("getEnvVar returns default when missing", () => {
    const value = getEnvVar("UNKNOWN_VAR", {
      defaultValue: "abc",
      parse: raw => raw,
    });
    expect(value).toBe("abc");
  });

  test("getEnvVar throws for missing required vars", () => {
    delete process.env.STAGE;
    process.env.NODE_ENV = "test";
    expect(() =>
      getEnvVar("UNKNOWN_VAR", { required: true, parse: raw => raw })
    ).toThrow("Missing required env var: UNKNOWN_VAR__test or UNKNOWN_VAR");
  });

  test("getEnvVar stageAware picks staged value first", () => {
    process.env.STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    expect(getEnvVar("MY_KEY", { parse: raw => raw })).toBe("staged");
    expect(getEnvVar("MY_KEY", { parse: raw => raw, stageAware: false })).toBe(
      "plain"
    );
  });

  test("parsers: number and boolean", () => {
    process.env.NUMBER_KEY = "42";
    process.env.BOOL_KEY = "true";
    expect(getNumber("NUMBER_KEY")).toBe(42);
    expect(getBoolean("BOOL_KEY")).toBe(true);
  });

  test("parsers reject malformed values", () => {
    process.env.NUMBER_KEY = "forty";
    process.env.BOOL_KEY = "maybe";
    expect(() => getNumber("NUMBER_KEY")).toThrow(
      "Env var NUMBER_KEY is not a number: forty"
    );
    expect(() => getBoolean("BOOL_KEY")).toThrow(
      "Env var BOOL_KEY is not a boolean: maybe"
    );
  });

  test("getString returns default", () => {
    expect(getString("NOPE", "x")).toBe("x");
    expect(getString("NOPE")).toBeUndefined();
  });

  test("getJson parses objects", () => {
    process.env.JSON_KEY = '{"Memory":0.2}';
    expect(getJson("JSON_KEY")).toEqual({ Memory: 0.2 });
    process.env.JSON_KEY = "{nope";
    expect(() => getJson("JSON_KEY")).toThrow(/not valid JSON/);
  });
});
