export interface Chunk {
  content: string;
  source: string;
  sequenceNo: number;
}

export interface EmbeddedChunk extends Chunk {
  embedding: number[];
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export type CannedLabel =
  | "greeting"
  | "simple"
  | "meeting_request"
  | "contact_request";

export type MenuLabel =
  | "schedule_demo"
  | "know_more"
  | "products"
  | "read_article"
  | "our_services"
  | "contact_us"
  | "end_chat";

export type OpenQueryLabel = "service_query" | "general_query";

export type IntentLabel = CannedLabel | MenuLabel | OpenQueryLabel;

export interface QuickReply {
  text: string;
  value: string;
}

export interface SourceReference {
  document: string;
  chunk_id: string;
  content_preview: string;
}

export interface ResponseEnvelope {
  answer: string;
  sources: SourceReference[];
  contact_form: boolean;
  meeting_form: boolean;
  quick_replies: QuickReply[];
}
