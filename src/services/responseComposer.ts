import { CopyDeck } from "../domain/copyDeck.js";
import { BackendUnavailableError, describeError } from "../domain/errors.js";
import {
  Chunk,
  IntentLabel,
  OpenQueryLabel,
  ResponseEnvelope,
  ScoredChunk,
  SourceReference,
} from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { CompletionClient, EmbeddingClient } from "../infra/ai/types.js";
import { KeywordIndex } from "../infra/store/keywordIndex.js";
import { buildContext, buildGroundedPrompt, toSourceReference } from "../pipelines/answering.js";
import { isBroadQueryIntent } from "../utils/text.js";

const WIDE_TOP_K = 8;
const NARROW_TOP_K = 4;
const KEYWORD_MATCH_LIMIT = 3;
const KEYWORD_CONTEXT_CHARS = 500;

export interface RetrievalRequest {
  label: IntentLabel;
  query: string;
  topK: number;
  contactForm: boolean;
  meetingForm: boolean;
}

export type ComposeResult =
  | { kind: "canned"; envelope: ResponseEnvelope }
  | { kind: "retrieval"; request: RetrievalRequest };

export interface GroundedAnswer {
  kind: "answered";
  answer: string;
  sources: SourceReference[];
}

export type VectorAnswer =
  | GroundedAnswer
  | { kind: "fallback_needed"; error: BackendUnavailableError };

export type KeywordAnswer = GroundedAnswer | { kind: "no_match" };

export class ResponseComposer {
  constructor(
    private readonly ai: EmbeddingClient & CompletionClient,
    private readonly copy: CopyDeck,
  ) {}

  compose(label: IntentLabel, text: string): ComposeResult {
    switch (label) {
      case "greeting":
      case "simple":
      case "contact_request":
      case "meeting_request": {
        const canned = this.copy.canned(label, text);
        return {
          kind: "canned",
          envelope: {
            answer: canned.answer,
            sources: [],
            contact_form: canned.contactForm,
            meeting_form: canned.meetingForm,
            quick_replies: canned.quickReplies.map((item) => ({ ...item })),
          },
        };
      }
      case "schedule_demo":
      case "know_more":
      case "products":
      case "read_article":
      case "our_services":
      case "contact_us":
      case "end_chat":
        return {
          kind: "retrieval",
          request: {
            label,
            query: this.copy.menuQuery(label),
            topK: WIDE_TOP_K,
            contactForm: label === "contact_us",
            meetingForm: label === "schedule_demo",
          },
        };
      case "service_query":
      case "general_query":
        return {
          kind: "retrieval",
          request: {
            label,
            query: text.trim(),
            topK: chooseTopK(label, text),
            contactForm: false,
            meetingForm: false,
          },
        };
    }
  }

  /** Never throws for backend failures; they come back as `fallback_needed`. */
  async answerFromVectors(request: RetrievalRequest, store: VectorStore): Promise<VectorAnswer> {
    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.ai.embedQuery(request.query);
    } catch (error) {
      return fallback("embedding", "Query embedding failed", error);
    }

    let hits: ScoredChunk[];
    try {
      hits = await store.similaritySearch(queryEmbedding, request.topK);
    } catch (error) {
      return fallback("vector_store", "Similarity search failed", error);
    }
    if (hits.length === 0) {
      return fallback("vector_store", "Similarity search returned no chunks", null);
    }

    const chunks = hits.map((hit) => hit.chunk);
    let answer: string;
    try {
      answer = await this.ai.generateCompletion(buildGroundedPrompt(request.query, buildContext(chunks)));
    } catch (error) {
      return fallback("completion", "Answer generation failed", error);
    }

    return { kind: "answered", answer, sources: chunks.map(toSourceReference) };
  }

  /** Completion failures here propagate; there is no further fallback below keywords. */
  async answerFromKeywords(request: RetrievalRequest, index: KeywordIndex): Promise<KeywordAnswer> {
    const matches = index.search(request.query, KEYWORD_MATCH_LIMIT);
    if (matches.length === 0) {
      return { kind: "no_match" };
    }

    const context = buildContext(matches.map(truncateForContext));
    const answer = await this.ai.generateCompletion(buildGroundedPrompt(request.query, context));
    return { kind: "answered", answer, sources: matches.map(toSourceReference) };
  }
}

function chooseTopK(label: OpenQueryLabel, text: string): number {
  if (label === "service_query" || isBroadQueryIntent(text)) {
    return WIDE_TOP_K;
  }
  return NARROW_TOP_K;
}

function truncateForContext(chunk: Chunk): Chunk {
  return { ...chunk, content: chunk.content.slice(0, KEYWORD_CONTEXT_CHARS) };
}

function fallback(
  backend: BackendUnavailableError["backend"],
  message: string,
  cause: unknown,
): VectorAnswer {
  const detail = cause === null ? message : `${message}: ${describeError(cause)}`;
  return {
    kind: "fallback_needed",
    error: new BackendUnavailableError(backend, detail, { cause }),
  };
}
