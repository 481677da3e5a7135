import { describe, it, expect } from "vitest";
import { DomainReputation, REPUTATION_THRESHOLD } from "../../src/discovery/domain-reputation.js";

describe("DomainReputation", () => {
  const reputation = new DomainReputation();

  it("scores known professional-society domains and their subdomains", () => {
    expect(reputation.score("https://ieee.org/conferences")).toBe(0.95);
    expect(reputation.score("https://events.ieee.org/ai-2025")).toBe(0.95);
  });

  it("falls back by top-level domain", () => {
    expect(reputation.score("https://www.stanford.edu/ai-week")).toBe(0.9);
    expect(reputation.score("https://pycon.org/2025")).toBe(0.75);
    expect(reputation.score("https://aisummit.io/2025")).toBe(0.5);
    expect(reputation.score("https://ki-konferenz.de/2025")).toBe(0.3);
  });

  it("scores unparseable URLs at 0.1", () => {
    expect(reputation.score("not a url")).toBe(0.1);
  });

  it("marks predatory listing sites below the threshold", () => {
    expect(reputation.score("https://conferencealerts.co.in/event/1")).toBe(0.2);
    expect(reputation.passes("https://conferencealerts.co.in/event/1")).toBe(false);
    expect(reputation.passes("https://pycon.org/2025", REPUTATION_THRESHOLD)).toBe(true);
  });

  it("lets overrides win over shorter built-in suffixes", () => {
    const custom = new DomainReputation({ "events.acm.org": 0.4 });
    expect(custom.score("https://events.acm.org/x")).toBe(0.4);
    expect(custom.score("https://dl.acm.org/x")).toBe(0.95);
  });
});
