import { CannedLabel, MenuLabel, QuickReply } from "./types.js";

export const QUICK_REPLIES = {
  services: { text: "Services", value: "our_services" },
  products: { text: "Products", value: "products" },
  bookMeeting: { text: "Book a Meeting", value: "schedule_demo" },
  contactUs: { text: "Contact Us", value: "contact_us" },
  knowMore: { text: "Know More", value: "know_more" },
  caseStudies: { text: "Case Studies", value: "read_article" },
} as const satisfies Record<string, QuickReply>;

/** Buttons attached to fixed system answers (not initialized, degraded service). */
export const FALLBACK_QUICK_REPLIES: readonly QuickReply[] = [
  QUICK_REPLIES.services,
  QUICK_REPLIES.products,
  QUICK_REPLIES.contactUs,
];

export const NO_RELEVANT_INFORMATION_ANSWER =
  "I don't have relevant information to answer your question.";

export const UNINITIALIZED_ANSWER = "Please initialize the system first before asking questions.";

export const DEGRADED_SERVICE_ANSWER =
  "I apologize, but I ran into a problem while processing your question. Please try again in a moment.";

export interface CannedReply {
  answer: string;
  quickReplies: readonly QuickReply[];
  contactForm: boolean;
  meetingForm: boolean;
}

export interface CopyDeck {
  canned(label: CannedLabel, utterance: string): CannedReply;
  menuQuery(label: MenuLabel): string;
}

export function createCopyDeck(companyName: string): CopyDeck {
  const menuQueries: Record<MenuLabel, string> = {
    schedule_demo: `How can I book a demo or a meeting with the ${companyName} team, and what does a demo cover?`,
    know_more: `Tell me about ${companyName}: what the company does, its expertise, services and achievements.`,
    products: `What are all ${companyName} products? List every product available.`,
    read_article: `What articles, blogs, case studies or other resources does ${companyName} provide?`,
    our_services: `What are ${companyName} services and offerings? List all services.`,
    contact_us: `How do I contact ${companyName}? What are the contact details, email, website and ways to reach the company?`,
    end_chat: `In one short overview, how can ${companyName} help a business before I go?`,
  };

  return {
    canned(label, utterance) {
      switch (label) {
        case "greeting":
          return reply(
            `**Welcome to ${companyName}!**\n\nI'm here to help you discover how AI can transform your business. Ask me anything about our services, products, or book a meeting with our experts.`,
            [QUICK_REPLIES.services, QUICK_REPLIES.products, QUICK_REPLIES.bookMeeting, QUICK_REPLIES.contactUs],
          );
        case "simple":
          return simpleReply(companyName, utterance);
        case "contact_request":
          return {
            ...reply(
              "**Let's Connect!**\n\nI'll help you get in touch with our team. Share a few quick details and we'll reach out to you shortly.\n\n• Full name\n• Email address\n• Phone number\n• Brief message\n\nOnce you provide the details, click 'Send Request' to submit.",
              [QUICK_REPLIES.services, QUICK_REPLIES.products, QUICK_REPLIES.bookMeeting],
            ),
            contactForm: true,
          };
        case "meeting_request":
          return {
            ...reply(
              "**Book Your Meeting!**\n\nLet's schedule a personalized session with our experts. Just provide a few details:\n\n• Full name\n• Email address\n• Phone number\n• Preferred date & time\n• Topics to discuss\n\nClick 'Schedule Meeting' when ready!",
              [QUICK_REPLIES.services, QUICK_REPLIES.products, QUICK_REPLIES.contactUs],
            ),
            meetingForm: true,
          };
      }
    },
    menuQuery(label) {
      return menuQueries[label];
    },
  };
}

function simpleReply(companyName: string, utterance: string): CannedReply {
  const normalized = utterance.trim().toLowerCase();

  if (normalized.startsWith("who are you") || normalized.startsWith("what is your name")) {
    return reply(
      `I'm the assistant for ${companyName}. I can help you learn about our AI solutions, products and services.\n\n**What can I help you with?**`,
      [QUICK_REPLIES.services, QUICK_REPLIES.products, QUICK_REPLIES.contactUs],
    );
  }

  if (normalized.startsWith("thank")) {
    return reply(
      "You're welcome! Happy to help anytime.\n\n**Anything else you'd like to know?**",
      [QUICK_REPLIES.services, QUICK_REPLIES.bookMeeting, QUICK_REPLIES.contactUs],
    );
  }

  return reply(
    "I'm here to help! Ask me about our AI services, products, case studies, or book a meeting with our team.\n\n**Where should we start?**",
    [QUICK_REPLIES.services, QUICK_REPLIES.products, QUICK_REPLIES.bookMeeting],
  );
}

function reply(answer: string, quickReplies: readonly QuickReply[]): CannedReply {
  return { answer, quickReplies, contactForm: false, meetingForm: false };
}
