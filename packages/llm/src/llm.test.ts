import { describe, it, expect, vi } from "vitest";
import type { InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { parseEnv } from "@kbconnect/config";
import { RequestValidationError } from "@kbconnect/errors";
import { BedrockLanguageModel, buildClaudeRequestBody } from "./bedrock-model.js";
import { CohereLanguageModel } from "./cohere-model.js";
import type { CohereChatRequest } from "./cohere-model.js";
import { createLanguageModel } from "./factory.js";

const CLIENT_OPTIONS = { region: "eu-central-1" };

function claudeBody(text: string): Uint8Array {
  return new TextEncoder().encode(JSON.stringify({ content: [{ type: "text", text }] }));
}

describe("LLM", () => {
  describe("buildClaudeRequestBody", () => {
    it("uses the Anthropic messages format", () => {
      expect(
        buildClaudeRequestBody("Hello", { maxTokens: 512, temperature: 0.1, topP: 0.9 }),
      ).toEqual({
        anthropic_version: "bedrock-2023-05-31",
        max_tokens: 512,
        temperature: 0.1,
        top_p: 0.9,
        messages: [{ role: "user", content: "Hello" }],
      });
    });

    it("omits top_p when not given", () => {
      expect(buildClaudeRequestBody("Hi", { maxTokens: 10, temperature: 0 })).not.toHaveProperty(
        "top_p",
      );
    });
  });

  describe("BedrockLanguageModel", () => {
    it("invokes the model and returns the first content block", async () => {
      const send = vi.fn(async (_command: InvokeModelCommand) => ({ body: claudeBody("Paris") }));
      const model = new BedrockLanguageModel({
        modelId: "anthropic.claude-3-haiku-20240307-v1:0",
        clientOptions: CLIENT_OPTIONS,
        client: { send },
      });

      const text = await model.complete("Capital of France?", { maxTokens: 100, temperature: 0.1 });

      expect(text).toBe("Paris");
      expect(send).toHaveBeenCalledTimes(1);
      const command = send.mock.calls[0]![0];
      expect(command.input.modelId).toBe("anthropic.claude-3-haiku-20240307-v1:0");
      expect(JSON.parse(String(command.input.body))).toEqual({
        anthropic_version: "bedrock-2023-05-31",
        max_tokens: 100,
        temperature: 0.1,
        messages: [{ role: "user", content: "Capital of France?" }],
      });
    });

    it("rejects models outside the Claude 3 family before calling Bedrock", async () => {
      const send = vi.fn(async (_command: InvokeModelCommand) => ({ body: claudeBody("x") }));
      const model = new BedrockLanguageModel({
        modelId: "amazon.titan-text-express-v1",
        clientOptions: CLIENT_OPTIONS,
        client: { send },
      });

      await expect(model.complete("q", { maxTokens: 10, temperature: 0 })).rejects.toThrow(
        "Unsupported model ID: amazon.titan-text-express-v1. Only Claude 3 models are supported.",
      );
      await expect(model.complete("q", { maxTokens: 10, temperature: 0 })).rejects.toBeInstanceOf(
        RequestValidationError,
      );
      expect(send).not.toHaveBeenCalled();
    });

    it("fails when the response carries no text block", async () => {
      const model = new BedrockLanguageModel({
        modelId: "anthropic.claude-3-haiku-20240307-v1:0",
        clientOptions: CLIENT_OPTIONS,
        client: {
          send: async () => ({ body: new TextEncoder().encode(JSON.stringify({ content: [] })) }),
        },
      });

      await expect(model.complete("q", { maxTokens: 10, temperature: 0 })).rejects.toThrow(
        "Model response did not contain text content",
      );
    });

    it("propagates SDK errors unchanged", async () => {
      const failure = Object.assign(new Error("denied"), { name: "AccessDeniedException" });
      const model = new BedrockLanguageModel({
        modelId: "anthropic.claude-3-haiku-20240307-v1:0",
        clientOptions: CLIENT_OPTIONS,
        client: {
          send: async () => {
            throw failure;
          },
        },
      });

      await expect(model.complete("q", { maxTokens: 10, temperature: 0 })).rejects.toBe(failure);
    });
  });

  describe("CohereLanguageModel", () => {
    it("sends a single user message and joins the text blocks", async () => {
      const chat = vi.fn(async (_request: CohereChatRequest) => ({
        message: {
          content: [
            { type: "text", text: "Hello " },
            { type: "thinking" },
            { type: "text", text: "world" },
          ],
        },
      }));
      const model = new CohereLanguageModel({ apiKey: "test-key", client: { chat } });

      const text = await model.complete("Say hi", { maxTokens: 50, temperature: 0.7, topP: 0.9 });

      expect(text).toBe("Hello world");
      expect(chat).toHaveBeenCalledWith({
        model: "command-r-plus",
        messages: [{ role: "user", content: "Say hi" }],
        maxTokens: 50,
        temperature: 0.7,
        p: 0.9,
      });
    });

    it("returns an empty string when the reply has no content", async () => {
      const model = new CohereLanguageModel({
        apiKey: "test-key",
        model: "command-r",
        client: { chat: async () => ({ message: {} }) },
      });

      expect(model.modelId).toBe("command-r");
      expect(await model.complete("x", { maxTokens: 5, temperature: 0 })).toBe("");
    });
  });

  describe("createLanguageModel factory", () => {
    const bedrockEnv = {
      AWS_ACCESS_KEY_ID: "test-access-key",
      AWS_SECRET_ACCESS_KEY: "test-secret",
      KNOWLEDGE_BASE_ID: "KB123",
    };

    it("uses MODEL_ID for answers and FILTER_MODEL_ID for extraction", () => {
      const config = parseEnv({
        ...bedrockEnv,
        MODEL_ID: "anthropic.claude-3-opus-20240229-v1:0",
      });

      const answer = createLanguageModel(config, "answer");
      const filter = createLanguageModel(config, "filter");

      expect(answer.name).toBe("bedrock");
      expect(answer.modelId).toBe("anthropic.claude-3-opus-20240229-v1:0");
      expect(filter.modelId).toBe("anthropic.claude-3-haiku-20240307-v1:0");
    });

    it("creates CohereLanguageModel for the cohere backend", () => {
      const config = parseEnv({
        ...bedrockEnv,
        GENERATION_BACKEND: "cohere",
        COHERE_API_KEY: "test-key",
        COHERE_CHAT_MODEL: "command-r",
      });

      const model = createLanguageModel(config);

      expect(model.name).toBe("cohere");
      expect(model.modelId).toBe("command-r");
    });

    it("throws when the cohere backend has no API key", () => {
      const config = parseEnv({ ...bedrockEnv, GENERATION_BACKEND: "cohere" });

      expect(() => createLanguageModel(config)).toThrow("Cohere API key is required");
    });
  });
});
