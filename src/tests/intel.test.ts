import { describe, it, expect } from "vitest";
import {
  coerceIntelligence,
  dedupeKey,
  emptyIntelligence,
  mergeIntelligence,
  missingCategories,
  hasNewEntries,
  newEntries,
  normalizePhone
} from "../core/intel";

describe("normalizePhone", () => {
  it("reduces every written form to ten national digits", () => {
    expect(normalizePhone("+91 98765 43210")).toBe("9876543210");
    expect(normalizePhone("919876543210")).toBe("9876543210");
    expect(normalizePhone("09876543210")).toBe("9876543210");
    expect(normalizePhone("98765-43210")).toBe("9876543210");
  });
});

describe("mergeIntelligence", () => {
  it("unions categories in first-seen order without equivalent duplicates", () => {
    const merged = mergeIntelligence(
      { phoneNumbers: ["+91-9876543210"], upiIds: ["Scam@YBL"], phishingLinks: ["http://a.in"] },
      { phoneNumbers: ["9876543210", "8123456789"], upiIds: ["scam@ybl"], phishingLinks: ["http://a.in", "http://b.in"] }
    );
    expect(merged.phoneNumbers).toEqual(["9876543210", "8123456789"]);
    expect(merged.upiIds).toEqual(["Scam@YBL"]);
    expect(merged.phishingLinks).toEqual(["http://a.in", "http://b.in"]);
  });

  it("drops blank entries and keeps other categories exact", () => {
    const merged = mergeIntelligence({ referenceIds: ["EMP-1", " ", "emp-1"], emails: [""] });
    expect(merged.referenceIds).toEqual(["EMP-1", "emp-1"]);
    expect(merged.emails).toEqual([]);
  });

  it("is idempotent", () => {
    const once = mergeIntelligence({ bankAccounts: ["123456789012"], emails: ["A@x.com"] });
    expect(mergeIntelligence(once, once)).toEqual(once);
  });
});

describe("missingCategories", () => {
  it("lists empty priority categories in priority order", () => {
    const record = emptyIntelligence();
    record.upiIds.push("x@ybl");
    record.suspiciousKeywords.push("otp");
    expect(missingCategories(record)).toEqual(["phishingLinks", "bankAccounts", "phoneNumbers", "referenceIds", "emails"]);
  });
});

describe("newEntries", () => {
  it("compares under the category's normalization", () => {
    expect(newEntries("phoneNumbers", ["+919876543210", "7000000001"], ["9876543210"])).toEqual(["7000000001"]);
    expect(newEntries("emails", ["A@B.com"], ["a@b.com"])).toEqual([]);
  });
});

describe("hasNewEntries", () => {
  it("is false when every candidate entry is already known", () => {
    expect(hasNewEntries("upiIds", ["X@YBL"], ["x@ybl"])).toBe(false);
    expect(hasNewEntries("upiIds", ["x@ybl", "y@okaxis"], ["x@ybl"])).toBe(true);
  });
});

describe("coerceIntelligence", () => {
  it("accepts common aliases and ignores junk", () => {
    const record = coerceIntelligence({
      links: ["http://x.in"],
      emailAddresses: ["a@b.com"],
      employeeIds: ["EMP-7"],
      phoneNumbers: [12345, "9876543210"],
      unrelated: ["?"]
    });
    expect(record.phishingLinks).toEqual(["http://x.in"]);
    expect(record.emails).toEqual(["a@b.com"]);
    expect(record.referenceIds).toEqual(["EMP-7"]);
    expect(record.phoneNumbers).toEqual(["9876543210"]);
    expect(dedupeKey("upiIds", " A@YBL ")).toBe("a@ybl");
  });

  it("returns an empty record for non-objects", () => {
    expect(coerceIntelligence("nope")).toEqual(emptyIntelligence());
  });
});
