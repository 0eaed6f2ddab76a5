import { beforeEach, describe, expect, it, vi } from "vitest";

const { mockCreate, mockConstructor } = vi.hoisted(() => ({
  mockCreate: vi.fn(),
  mockConstructor: vi.fn(),
}));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create: mockCreate };
    constructor(options: unknown) {
      mockConstructor(options);
    }
  },
}));

import { DEFAULT_MODEL, createAnthropicGenerator } from "./anthropic.js";

const request = {
  system: "You write protocols.",
  prompt: "Methods: mix.",
  temperature: 0.3,
  maxOutputTokens: 4000,
  json: true,
};

describe("createAnthropicGenerator", () => {
  beforeEach(() => {
    mockCreate.mockReset();
    mockConstructor.mockReset();
  });

  it("configures the client with key and timeout", () => {
    const generator = createAnthropicGenerator({ apiKey: "test-key", timeoutMs: 5000 });

    expect(generator.model).toBe(DEFAULT_MODEL);
    expect(mockConstructor).toHaveBeenCalledWith({ apiKey: "test-key", timeout: 5000, maxRetries: 2 });
  });

  it("sends the request with a JSON prefill and restores it in the reply", async () => {
    mockCreate.mockResolvedValueOnce({ content: [{ type: "text", text: '"title": "Mixing"}' }] });
    const generator = createAnthropicGenerator({ apiKey: "test-key", model: "test-model" });

    await expect(generator.generate(request)).resolves.toBe('{"title": "Mixing"}');
    expect(mockCreate).toHaveBeenCalledWith({
      model: "test-model",
      max_tokens: 4000,
      temperature: 0.3,
      system: "You write protocols.",
      messages: [
        { role: "user", content: "Methods: mix." },
        { role: "assistant", content: "{" },
      ],
    });
  });

  it("omits the prefill for plain text requests", async () => {
    mockCreate.mockResolvedValueOnce({
      content: [
        { type: "text", text: "Part one. " },
        { type: "tool_use", id: "t1", name: "noop", input: {} },
        { type: "text", text: "Part two." },
      ],
    });
    const generator = createAnthropicGenerator({ apiKey: "test-key" });

    await expect(generator.generate({ ...request, json: false })).resolves.toBe("Part one. Part two.");
    expect(mockCreate.mock.calls[0]?.[0]).toMatchObject({ messages: [{ role: "user", content: "Methods: mix." }] });
  });

  it("propagates API errors", async () => {
    mockCreate.mockRejectedValueOnce(new Error("overloaded"));
    const generator = createAnthropicGenerator({ apiKey: "test-key" });

    await expect(generator.generate(request)).rejects.toThrow("overloaded");
  });
});
