import { IntentLabel, MenuLabel } from "../domain/types.js";
import { normalizeUtterance, tokenize } from "../utils/text.js";

export interface IntentRule {
  label: IntentLabel;
  test: (utterance: string) => boolean;
}

export interface IntentRuleOptions {
  /** Lowercased and matched as a phrase; any mention counts as a service question. */
  companyName?: string;
}

const TRAILING_PUNCTUATION = /[\s!.?,]+$/;

const GREETING_PATTERN =
  /^(hi|hello|hey|hii|hai|helo|good (morning|afternoon|evening)|how are you|what'?s up|greetings?)$/;

const SIMPLE_PATTERN = /^(who are you|what is your name|help|thanks|thank you)$/;

const MENU_VALUES: ReadonlyArray<readonly [MenuLabel, readonly string[]]> = [
  ["schedule_demo", ["schedule a meeting", "schedule a demo", "schedule_demo", "demo", "meeting"]],
  ["know_more", ["know more about us", "know_more", "know more", "about us", "about"]],
  ["products", ["products", "product", "our products"]],
  [
    "read_article",
    ["read an article", "read_article", "article", "blog", "case studies", "case_studies"],
  ],
  ["our_services", ["our services", "our_services", "services"]],
  ["contact_us", ["contact us", "contact_us", "contact"]],
];

const END_CHAT_PATTERN =
  /\b(bye|goodbye|thanks|thank you|that'?s all|done|finished|exit|quit|no more|nothing else|i'?m good|all set)\b/;

// Stems carry no trailing boundary, so inflections ("booking", "meetings", "reaching") match.
const MEETING_PATTERNS: readonly RegExp[] = [
  /\b(book|schedule|arrange|set up|setup).*\b(meeting|appointment|call|demo)/,
  /\b(want|need|would like|'d like) to\b.*\b(meet|schedule|book)/,
  /\b(meeting|demo|consultation|appointment)s? (request|booking)/,
];

const CONTACT_PATTERNS: readonly RegExp[] = [
  /\b(contact|connect|reach|get in touch|speak with|speak to|talk to|talk with).*\b(company|team|someone|you)/,
  /\b(want|need|would like|'d like) to\b.*\b(contact|connect|speak|talk)/,
  /\bhow (can|do) i\b.*\b(contact|reach|connect)/,
  /\b(email|phone|call).*\bcompany/,
  /\bbusiness inquir(y|ies)/,
  /\bsales (team|contact|inquir)/,
  /\bpartnership.*\bopportunit(y|ies)/,
];

const SERVICE_VOCABULARY = new Set([
  "service",
  "services",
  "ai",
  "development",
  "generation",
  "chatbot",
  "automation",
  "offer",
  "provide",
  "capabilities",
  "solutions",
]);

/**
 * Ordered rule list; the first rule whose test passes decides the label.
 * Anything no rule claims is a `general_query`.
 */
export function buildIntentRules(options: IntentRuleOptions = {}): IntentRule[] {
  const companyName = options.companyName?.trim().toLowerCase() ?? "";

  const menuLookup = new Map<string, MenuLabel>();
  for (const [label, values] of MENU_VALUES) {
    for (const value of values) {
      menuLookup.set(value, label);
    }
  }

  const menuRules: IntentRule[] = MENU_VALUES.map(([label]) => ({
    label,
    test: (utterance) => menuLookup.get(stripTrailingPunctuation(utterance)) === label,
  }));

  return [
    { label: "greeting", test: (utterance) => GREETING_PATTERN.test(stripTrailingPunctuation(utterance)) },
    { label: "simple", test: (utterance) => SIMPLE_PATTERN.test(stripTrailingPunctuation(utterance)) },
    ...menuRules,
    { label: "end_chat", test: (utterance) => END_CHAT_PATTERN.test(utterance) },
    { label: "meeting_request", test: (utterance) => matchesAny(MEETING_PATTERNS, utterance) },
    { label: "contact_request", test: (utterance) => matchesAny(CONTACT_PATTERNS, utterance) },
    {
      label: "service_query",
      test: (utterance) =>
        tokenize(utterance).some((token) => SERVICE_VOCABULARY.has(token)) ||
        (companyName.length > 0 && utterance.includes(companyName)),
    },
  ];
}

export const DEFAULT_INTENT_RULES: readonly IntentRule[] = buildIntentRules();

export function classifyIntent(
  text: string,
  rules: readonly IntentRule[] = DEFAULT_INTENT_RULES,
): IntentLabel {
  const utterance = normalizeUtterance(text).replace(/’/g, "'");
  for (const rule of rules) {
    if (rule.test(utterance)) {
      return rule.label;
    }
  }
  return "general_query";
}

function stripTrailingPunctuation(utterance: string): string {
  return utterance.replace(TRAILING_PUNCTUATION, "");
}

function matchesAny(patterns: readonly RegExp[], utterance: string): boolean {
  return patterns.some((pattern) => pattern.test(utterance));
}
