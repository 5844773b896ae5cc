import { describe, expect, it } from "vitest";
import { createCopyDeck } from "../src/domain/copyDeck.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";
import { KeywordIndex } from "../src/infra/store/keywordIndex.js";
import { ResponseComposer, RetrievalRequest } from "../src/services/responseComposer.js";
import { embedForTest, FakeAiClient } from "./support/fakes.js";

const request = (query: string, topK = 4): RetrievalRequest => ({
  label: "general_query",
  query,
  topK,
  contactForm: false,
  meetingForm: false,
});

describe("ResponseComposer", () => {
  const build = (ai = new FakeAiClient()) => ({ ai, composer: new ResponseComposer(ai, createCopyDeck("Acme AI")) });

  it("answers canned intents without retrieval", () => {
    const { composer } = build();

    const result = composer.compose("contact_request", "contact me please");

    expect(result.kind).toBe("canned");
    if (result.kind === "canned") {
      expect(result.envelope.contact_form).toBe(true);
      expect(result.envelope.sources).toEqual([]);
    }
  });

  it("widens retrieval for broad questions", () => {
    const { composer } = build();

    const broad = composer.compose("general_query", "  List all your offerings  ");
    const narrow = composer.compose("general_query", "Where is your office?");

    expect(broad).toEqual({
      kind: "retrieval",
      request: {
        label: "general_query",
        query: "List all your offerings",
        topK: 8,
        contactForm: false,
        meetingForm: false,
      },
    });
    expect(narrow.kind === "retrieval" && narrow.request.topK).toBe(4);
  });

  it("rewrites menu labels into fixed company queries", () => {
    const { composer } = build();

    const result = composer.compose("know_more", "Know More");

    expect(result.kind === "retrieval" && result.request.query).toBe(
      "Tell me about Acme AI: what the company does, its expertise, services and achievements.",
    );
  });

  it("reports an empty vector store as a vector store failure", async () => {
    const { composer } = build();

    const answer = await composer.answerFromVectors(request("pricing"), new InMemoryVectorStore());

    expect(answer.kind).toBe("fallback_needed");
    if (answer.kind === "fallback_needed") {
      expect(answer.error.backend).toBe("vector_store");
      expect(answer.error.message).toBe("Similarity search returned no chunks");
    }
  });

  it("tags query embedding failures with their backend", async () => {
    const ai = new FakeAiClient();
    ai.failEmbedQuery = true;
    const { composer } = build(ai);
    const store = new InMemoryVectorStore();
    await store.replaceAll([
      { content: "Pricing details", source: "a.txt", sequenceNo: 0, embedding: embedForTest("Pricing details") },
    ]);

    const answer = await composer.answerFromVectors(request("pricing"), store);

    expect(answer.kind === "fallback_needed" && answer.error.backend).toBe("embedding");
    expect(answer.kind === "fallback_needed" && answer.error.message).toBe(
      "Query embedding failed: embedding service down",
    );
  });

  it("caps keyword context per chunk", async () => {
    const { ai, composer } = build();
    const longText = `pricing ${"x".repeat(600)}`;
    const index = new KeywordIndex([{ content: longText, source: "long.txt", sequenceNo: 2 }]);

    const answer = await composer.answerFromKeywords(request("pricing"), index);

    expect(ai.prompts[0]).toContain(`[long.txt]\n${longText.slice(0, 500)}\n\nQuestion: pricing`);
    expect(answer).toEqual({
      kind: "answered",
      answer: "**Answer**\n\nGrounded reply.",
      sources: [
        {
          document: "long.txt",
          chunk_id: "long.txt:2",
          content_preview: `${longText.slice(0, 200)}...`,
        },
      ],
    });
  });

  it("reports no match without calling the model", async () => {
    const { ai, composer } = build();

    const answer = await composer.answerFromKeywords(request("zzz"), new KeywordIndex([]));

    expect(answer).toEqual({ kind: "no_match" });
    expect(ai.prompts).toHaveLength(0);
  });
});
