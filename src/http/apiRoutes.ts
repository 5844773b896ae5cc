import { z } from "zod";
import { describeError, IngestionError } from "../domain/errors.js";
import { IndexService, IndexStatus } from "../services/indexService.js";
import { LeadRelayService } from "../services/leadRelayService.js";
import { QueryOrchestrator } from "../services/queryOrchestrator.js";

export interface ApiDependencies {
  orchestrator: QueryOrchestrator;
  indexService: IndexService;
  leadRelay: LeadRelayService;
}

export interface ApiRequest {
  method: string;
  pathname: string;
  rawBody: string;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

type RouteHandler = (body: unknown, deps: ApiDependencies) => Promise<ApiResponse>;

const requiredField = z.string({ required_error: "missing" }).trim().min(1);

const chatSchema = z.object({
  message: z.string(),
});

const contactSchema = z.object({
  name: requiredField,
  email: requiredField,
  phone: requiredField,
  message: requiredField,
});

const meetingSchema = z.object({
  name: requiredField,
  email: requiredField,
  phone: requiredField,
  preferred_date: requiredField,
  meeting_purpose: requiredField,
});

const ROUTES: Record<string, Partial<Record<string, RouteHandler>>> = {
  "/api/health": {
    GET: async () => ok({ status: "healthy" }),
  },
  "/api/chat": {
    POST: handleChat,
  },
  "/api/initialize": {
    POST: handleInitialize,
  },
  "/api/index/status": {
    GET: async (_body, deps) => ok(toStatusBody(deps.indexService.getStatus())),
  },
  "/api/contact_company": {
    POST: handleContactCompany,
  },
  "/api/schedule_meeting": {
    POST: handleScheduleMeeting,
  },
};

export function isApiPath(pathname: string): boolean {
  return pathname === "/api" || pathname.startsWith("/api/");
}

export async function handleApiRequest(
  request: ApiRequest,
  deps: ApiDependencies,
): Promise<ApiResponse> {
  const route = ROUTES[request.pathname];
  if (!route) {
    return error(404, "Not found");
  }

  const method = request.method.toUpperCase();
  if (method === "OPTIONS") {
    return { status: 204, body: null };
  }

  const handler = route[method];
  if (!handler) {
    return error(405, "Method not allowed");
  }

  let body: unknown = {};
  const raw = request.rawBody.trim();
  if (raw) {
    try {
      body = JSON.parse(raw);
    } catch (parseError) {
      console.error(`[server] rejected invalid JSON on ${request.pathname}: ${describeError(parseError)}`);
      return error(400, "Invalid JSON body");
    }
  }

  return handler(body, deps);
}

async function handleChat(body: unknown, deps: ApiDependencies): Promise<ApiResponse> {
  const parsed = chatSchema.safeParse(body);
  if (!parsed.success || !parsed.data.message.trim()) {
    return error(400, "No message provided");
  }

  const envelope = await deps.orchestrator.query(parsed.data.message);
  return ok({
    response: envelope.answer,
    sources: envelope.sources,
    contact_form: envelope.contact_form,
    meeting_form: envelope.meeting_form,
    quick_replies: envelope.quick_replies,
  });
}

async function handleInitialize(_body: unknown, deps: ApiDependencies): Promise<ApiResponse> {
  try {
    const summary = await deps.indexService.initializeDocuments();
    return ok({
      message: "Documents initialized successfully",
      chunk_count: summary.chunkCount,
      document_count: summary.documentCount,
      mode: summary.mode,
    });
  } catch (initError) {
    const kind = initError instanceof IngestionError ? "ingestion" : "unexpected";
    console.error(`[server] initialize failed (${kind}): ${describeError(initError)}`);
    return {
      status: 500,
      body: { error: "Failed to initialize documents", detail: describeError(initError) },
    };
  }
}

async function handleContactCompany(body: unknown, deps: ApiDependencies): Promise<ApiResponse> {
  const parsed = contactSchema.safeParse(body);
  if (!parsed.success) {
    return missingField(parsed.error);
  }

  const sent = await deps.leadRelay.relayContact(parsed.data);
  return sent
    ? ok({ message: "Contact request sent successfully" })
    : error(500, "Failed to send contact request");
}

async function handleScheduleMeeting(body: unknown, deps: ApiDependencies): Promise<ApiResponse> {
  const parsed = meetingSchema.safeParse(body);
  if (!parsed.success) {
    return missingField(parsed.error);
  }

  const { preferred_date: preferredDate, meeting_purpose: meetingPurpose, ...contact } = parsed.data;
  const sent = await deps.leadRelay.relayMeeting({ ...contact, preferredDate, meetingPurpose });
  return sent
    ? ok({ message: "Meeting request sent successfully" })
    : error(500, "Failed to send meeting request");
}

function toStatusBody(status: IndexStatus) {
  return {
    lifecycle: status.lifecycle,
    mode: status.mode,
    chunk_count: status.chunkCount,
    document_count: status.documentCount,
    documents: status.documents,
    built_at: status.builtAt,
  };
}

function missingField(validationError: z.ZodError): ApiResponse {
  const field = validationError.issues[0]?.path[0];
  if (typeof field === "string") {
    return error(400, `Missing required field: ${field}`);
  }
  return error(400, "Request body must be a JSON object");
}

function ok(body: unknown): ApiResponse {
  return { status: 200, body };
}

function error(status: number, message: string): ApiResponse {
  return { status, body: { error: message } };
}
