import { QUICK_REPLIES } from "../domain/copyDeck.js";
import { IntentLabel, QuickReply } from "../domain/types.js";
import { tokenize } from "../utils/text.js";

const MIN_SUGGESTIONS = 3;
const MAX_SUGGESTIONS = 6;

export const DEFAULT_MENU: readonly QuickReply[] = [
  QUICK_REPLIES.services,
  QUICK_REPLIES.products,
  QUICK_REPLIES.caseStudies,
  QUICK_REPLIES.bookMeeting,
  QUICK_REPLIES.contactUs,
];

interface KeywordGroup {
  keywords: readonly string[];
  preset: readonly QuickReply[];
}

// Checked in order; the first group with a keyword in the answer wins.
const KEYWORD_GROUPS: readonly KeywordGroup[] = [
  {
    keywords: ["service", "ai", "development", "solution", "automation"],
    preset: [QUICK_REPLIES.services, QUICK_REPLIES.products, QUICK_REPLIES.bookMeeting],
  },
  {
    keywords: ["demo", "meeting", "consultation", "discuss"],
    preset: [QUICK_REPLIES.bookMeeting, QUICK_REPLIES.contactUs, QUICK_REPLIES.services],
  },
  {
    keywords: ["contact", "support", "help", "team"],
    preset: [QUICK_REPLIES.contactUs, QUICK_REPLIES.services, QUICK_REPLIES.bookMeeting],
  },
  {
    keywords: ["learn", "information", "about", "company", "product"],
    preset: [QUICK_REPLIES.knowMore, QUICK_REPLIES.caseStudies, QUICK_REPLIES.contactUs],
  },
];

export function suggestQuickReplies(answer: string, label: IntentLabel): QuickReply[] {
  const words = new Set(tokenize(answer));
  const group = KEYWORD_GROUPS.find(({ keywords }) => keywords.some((keyword) => words.has(keyword)));

  const suggestions = (group?.preset ?? DEFAULT_MENU).filter((item) => item.value !== label);

  for (const item of DEFAULT_MENU) {
    if (suggestions.length >= MIN_SUGGESTIONS) {
      break;
    }
    if (item.value !== label && !suggestions.some((existing) => existing.value === item.value)) {
      suggestions.push(item);
    }
  }

  return suggestions.slice(0, MAX_SUGGESTIONS).map((item) => ({ ...item }));
}
