import { describe, it, expect, vi } from "vitest";
import { createQueryEmbedder } from "./factory.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereEmbedRequest } from "./cohere-provider.js";

describe("Embeddings", () => {
  describe("createQueryEmbedder", () => {
    it("builds a Cohere provider with the configured model", () => {
      const provider = createQueryEmbedder({
        apiKey: "test-key",
        embedModel: "embed-multilingual-v3.0",
        chatModel: "command-r-plus",
      });
      expect(provider.name).toBe("cohere");
      expect(provider.model).toBe("embed-multilingual-v3.0");
    });

    it("requires an API key", () => {
      expect(() => createQueryEmbedder({ embedModel: "embed-v4.0", chatModel: "command-r-plus" })).toThrow(
        "COHERE_API_KEY is required for query embeddings",
      );
    });
  });

  describe("CohereEmbeddingProvider", () => {
    it("embeds the query with the search_query input type", async () => {
      const embed = vi.fn(async (_request: CohereEmbedRequest) => ({
        embeddings: { float: [[0.1, 0.2, 0.3]] },
      }));
      const provider = new CohereEmbeddingProvider({ apiKey: "test-key", client: { embed } });

      const vector = await provider.embedQuery("who wrote the report?");

      expect(vector).toEqual([0.1, 0.2, 0.3]);
      expect(embed).toHaveBeenCalledWith({
        texts: ["who wrote the report?"],
        model: "embed-v4.0",
        inputType: "search_query",
        embeddingTypes: ["float"],
      });
    });

    it("throws when no float embedding comes back", async () => {
      const provider = new CohereEmbeddingProvider({
        apiKey: "test-key",
        client: { embed: async () => ({ embeddings: {} }) },
      });

      await expect(provider.embedQuery("q")).rejects.toThrow(
        "Cohere returned no float embedding for the query",
      );
    });
  });
});
