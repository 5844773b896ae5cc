import { describe, expect, it } from "vitest";
import { DEFAULT_MENU, suggestQuickReplies } from "../src/pipelines/suggestions.js";

const values = (answer: string, label: Parameters<typeof suggestQuickReplies>[1]) =>
  suggestQuickReplies(answer, label).map((reply) => reply.value);

describe("suggestQuickReplies", () => {
  it("offers the service preset for service answers", () => {
    expect(suggestQuickReplies("We offer AI development services.", "general_query")).toEqual([
      { text: "Services", value: "our_services" },
      { text: "Products", value: "products" },
      { text: "Book a Meeting", value: "schedule_demo" },
    ]);
  });

  it("drops the active label and tops up from the default menu", () => {
    expect(values("We offer AI development services.", "our_services")).toEqual([
      "products",
      "schedule_demo",
      "read_article",
    ]);
  });

  it("offers the meeting preset for meeting answers", () => {
    expect(values("Let's discuss your goals in a demo.", "general_query")).toEqual([
      "schedule_demo",
      "contact_us",
      "our_services",
    ]);
  });

  it("offers the contact preset for contact answers", () => {
    expect(values("Our team is here for you.", "general_query")).toEqual([
      "contact_us",
      "our_services",
      "schedule_demo",
    ]);
  });

  it("offers the informational preset without repeating know more", () => {
    expect(values("Learn more about the company.", "general_query")).toEqual([
      "know_more",
      "read_article",
      "contact_us",
    ]);
    expect(values("Learn more about the company.", "know_more")).toEqual([
      "read_article",
      "contact_us",
      "our_services",
    ]);
  });

  it("checks the service group before the meeting group", () => {
    expect(values("Book a demo to see our automation in action.", "general_query")).toEqual([
      "our_services",
      "products",
      "schedule_demo",
    ]);
  });

  it("falls back to the full default menu", () => {
    expect(suggestQuickReplies("Hello there.", "general_query")).toEqual([...DEFAULT_MENU]);
    expect(values("Hello there.", "products")).toEqual([
      "our_services",
      "read_article",
      "schedule_demo",
      "contact_us",
    ]);
  });

  it("returns fresh objects each call", () => {
    const first = suggestQuickReplies("Hello there.", "general_query");
    first[0].text = "changed";
    expect(suggestQuickReplies("Hello there.", "general_query")[0].text).toBe("Services");
  });
});
