import {
  DEGRADED_SERVICE_ANSWER,
  FALLBACK_QUICK_REPLIES,
  NO_RELEVANT_INFORMATION_ANSWER,
  UNINITIALIZED_ANSWER,
} from "../domain/copyDeck.js";
import { describeError } from "../domain/errors.js";
import { ResponseEnvelope, SourceReference } from "../domain/types.js";
import { classifyIntent, DEFAULT_INTENT_RULES, IntentRule } from "../pipelines/intentClassifier.js";
import { suggestQuickReplies } from "../pipelines/suggestions.js";
import { IndexService, IndexSnapshot } from "./indexService.js";
import { KeywordAnswer, ResponseComposer, RetrievalRequest } from "./responseComposer.js";

export interface QueryOrchestratorOptions {
  indexService: IndexService;
  composer: ResponseComposer;
  rules?: readonly IntentRule[];
}

export class QueryOrchestrator {
  private readonly rules: readonly IntentRule[];

  constructor(private readonly options: QueryOrchestratorOptions) {
    this.rules = options.rules ?? DEFAULT_INTENT_RULES;
  }

  /** Always resolves with a complete envelope; internal failures become a polite answer. */
  async query(text: string): Promise<ResponseEnvelope> {
    try {
      return await this.answer(text);
    } catch (error) {
      console.error(`[query] failed to answer, returning degraded response: ${describeError(error)}`);
      return fixedEnvelope(DEGRADED_SERVICE_ANSWER);
    }
  }

  private async answer(text: string): Promise<ResponseEnvelope> {
    const label = classifyIntent(text, this.rules);
    const composed = this.options.composer.compose(label, text);
    if (composed.kind === "canned") {
      return composed.envelope;
    }

    const { request } = composed;
    const snapshot = this.options.indexService.getSnapshot();
    if (!snapshot) {
      return {
        ...fixedEnvelope(UNINITIALIZED_ANSWER),
        contact_form: request.contactForm,
        meeting_form: request.meetingForm,
      };
    }

    const result = await this.retrieve(request, snapshot);
    const answer = result.kind === "answered" ? result.answer : NO_RELEVANT_INFORMATION_ANSWER;
    const sources: SourceReference[] = result.kind === "answered" ? result.sources : [];

    return {
      answer,
      sources,
      contact_form: request.contactForm,
      meeting_form: request.meetingForm,
      quick_replies: suggestQuickReplies(answer, label),
    };
  }

  private async retrieve(
    request: RetrievalRequest,
    snapshot: IndexSnapshot,
  ): Promise<KeywordAnswer> {
    const { composer } = this.options;

    if (snapshot.mode === "vector") {
      const viaVectors = await composer.answerFromVectors(request, snapshot.store);
      if (viaVectors.kind === "answered") {
        return viaVectors;
      }
      console.error(
        `[query] ${viaVectors.error.backend} unavailable, using keyword fallback: ${viaVectors.error.message}`,
      );
    }

    return composer.answerFromKeywords(request, snapshot.keywordIndex);
  }
}

function fixedEnvelope(answer: string): ResponseEnvelope {
  return {
    answer,
    sources: [],
    contact_form: false,
    meeting_form: false,
    quick_replies: FALLBACK_QUICK_REPLIES.map((item) => ({ ...item })),
  };
}
