import { describe, it, expect } from "vitest";
import path from "path";
import {
  APP_NAME,
  ConfigError,
  DEFAULT_CORPUS_PATH,
  getConfig,
  parseBoolEnv,
  parseFloatEnv,
  parseIntEnv,
} from "../src/config";

describe("getConfig", () => {
  it("requires OPENAI_API_KEY", () => {
    expect(() => getConfig({})).toThrow(ConfigError);
    expect(() => getConfig({ OPENAI_API_KEY: "   " })).toThrow("OPENAI_API_KEY is not set");
  });

  it("applies defaults", () => {
    expect(getConfig({ OPENAI_API_KEY: "test-key" })).toEqual({
      OPENAI_API_KEY: "test-key",
      OPENAI_MODEL: "gpt-3.5-turbo",
      OPENAI_TIMEOUT_MS: 60000,
      MAX_TOKENS: 150,
      TEMPERATURE: 0.7,
      MODEL_NAME: "text-embedding-3-small",
      EMBEDDING_DIMENSIONS: 384,
      CORPUS_PATH: DEFAULT_CORPUS_PATH,
      TOP_K: 3,
      SIMILARITY_THRESHOLD: 0.6,
      PORT: 5000,
      HOST: "0.0.0.0",
      CORS_ORIGIN: ["*"],
      TRANSPORT: "http",
      VERBOSE: false,
    });
  });

  it("reads overrides", () => {
    const config = getConfig({
      OPENAI_API_KEY: "test-key",
      OPENAI_MODEL: "gpt-4o-mini",
      MAX_TOKENS: "300",
      TEMPERATURE: "0",
      TOP_K: "5",
      SIMILARITY_THRESHOLD: "0.25",
      PORT: "8080",
      CORS_ORIGIN: "http://localhost:3000, http://127.0.0.1:3000",
      TRANSPORT: "STDIO",
      VERBOSE: "yes",
      CORPUS_PATH: "/srv/corpus",
      EMBEDDING_DIMENSIONS: "0",
    });
    expect(config.OPENAI_MODEL).toBe("gpt-4o-mini");
    expect(config.MAX_TOKENS).toBe(300);
    expect(config.TEMPERATURE).toBe(0);
    expect(config.TOP_K).toBe(5);
    expect(config.SIMILARITY_THRESHOLD).toBe(0.25);
    expect(config.PORT).toBe(8080);
    expect(config.CORS_ORIGIN).toEqual(["http://localhost:3000", "http://127.0.0.1:3000"]);
    expect(config.TRANSPORT).toBe("stdio");
    expect(config.VERBOSE).toBe(true);
    expect(config.CORPUS_PATH).toBe(path.resolve("/srv/corpus"));
    expect(config.EMBEDDING_DIMENSIONS).toBe(0);
  });

  it("falls back on unusable numbers and clamps top_k", () => {
    const config = getConfig({
      OPENAI_API_KEY: "test-key",
      TOP_K: "500",
      TEMPERATURE: "hot",
      SIMILARITY_THRESHOLD: "3",
    });
    expect(config.TOP_K).toBe(50);
    expect(config.TEMPERATURE).toBe(0.7);
    expect(config.SIMILARITY_THRESHOLD).toBe(0.6);
  });

  it("reads the package name", () => {
    expect(APP_NAME).toBe("rag-query-server");
  });
});

describe("env parsers", () => {
  it("parseIntEnv floors and clamps", () => {
    expect(parseIntEnv("7.9", 1, 1, 10)).toBe(7);
    expect(parseIntEnv("-4", 1, 1, 10)).toBe(1);
    expect(parseIntEnv(undefined, 3, 1, 10)).toBe(3);
    expect(parseIntEnv("abc", 3, 1, 10)).toBe(3);
  });

  it("parseFloatEnv rejects out-of-range values", () => {
    expect(parseFloatEnv("1.5", 0.7, 0, 2)).toBe(1.5);
    expect(parseFloatEnv("2.5", 0.7, 0, 2)).toBe(0.7);
  });

  it("parseBoolEnv accepts common truthy forms", () => {
    for (const v of ["1", "true", "YES", " on "]) expect(parseBoolEnv(v)).toBe(true);
    for (const v of [undefined, "", "0", "off", "no"]) expect(parseBoolEnv(v)).toBe(false);
  });
});
