import { Chunk, SourceReference } from "../domain/types.js";
import { truncateWithEllipsis } from "../utils/text.js";

const SOURCE_PREVIEW_CHARS = 200;

export function buildGroundedPrompt(question: string, context: string): string {
  return [
    "You are the customer assistant on a company website.",
    "Answer the question using ONLY the context below. If the context does not contain the answer, say so in one sentence.",
    "",
    "Format:",
    "- Start with a short title.",
    "- Follow with 1 to 3 summary lines.",
    "- Then at most 6 bullet points, each at most 5 words.",
    "",
    "Rules:",
    "- Do not invent facts, names, prices or dates.",
    "- Do not add sections the question did not ask for.",
    "- Do not end with a \"what next\" or \"let me know\" line.",
    "",
    "Context:",
    context,
    "",
    `Question: ${question}`,
    "",
    "Answer:",
  ].join("\n");
}

export function buildContext(chunks: Chunk[]): string {
  return chunks.map((chunk) => `[${chunk.source}]\n${chunk.content}`).join("\n\n");
}

export function toSourceReference(chunk: Chunk): SourceReference {
  return {
    document: chunk.source,
    chunk_id: `${chunk.source}:${chunk.sequenceNo}`,
    content_preview: truncateWithEllipsis(chunk.content, SOURCE_PREVIEW_CHARS),
  };
}
