/**
 * Unit tests for LLM adapters (stub and factory).
 */

import { OpenAILLM, AnthropicLLM, StubLLM, createLLM, createLlmHandles } from "../../../src/adapters/llm";
import { testConfig } from "../../helpers/config";

describe("StubLLM", () => {
  it("returns empty response", async () => {
    const llm = new StubLLM();
    const result = await llm.chat([{ role: "user", content: "Hello" }]);
    expect(result.text).toBe("");
  });

  it("returns the configured reply", async () => {
    const result = await new StubLLM("valid").chat([{ role: "user", content: "Hello" }]);
    expect(result.text).toBe("valid");
  });
});

describe("createLLM", () => {
  it("returns StubLLM when provider is stub", () => {
    const config = testConfig({ logsDir: "unused" });
    expect(createLLM(config, config.llm.main)).toBeInstanceOf(StubLLM);
  });

  it("returns StubLLM when the provider has no API key", () => {
    const config = testConfig({ logsDir: "unused" });
    config.llm.provider = "anthropic";
    expect(createLLM(config, config.llm.decision)).toBeInstanceOf(StubLLM);
  });

  it("builds the provider adapter when a key is set", () => {
    const config = testConfig({ logsDir: "unused" });
    config.llm.provider = "openai";
    config.llm.openaiApiKey = "test-secret";
    expect(createLLM(config, config.llm.main)).toBeInstanceOf(OpenAILLM);
    config.llm.provider = "anthropic";
    config.llm.anthropicApiKey = "test-secret";
    expect(createLLM(config, config.llm.main)).toBeInstanceOf(AnthropicLLM);
  });

  it("creates one handle per role", () => {
    const handles = createLlmHandles(testConfig({ logsDir: "unused" }));
    expect(Object.keys(handles).sort()).toEqual(["decision", "main", "session", "summary", "validation"]);
  });
});
