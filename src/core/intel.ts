export const INTEL_CATEGORIES = [
  "phoneNumbers",
  "bankAccounts",
  "upiIds",
  "phishingLinks",
  "emails",
  "referenceIds",
  "suspiciousKeywords"
] as const;

export type IntelCategory = (typeof INTEL_CATEGORIES)[number];

export type IntelligenceRecord = Record<IntelCategory, string[]>;

/** Extraction targets, highest value first. Keyword mentions are not a target. */
export const PRIORITY_CATEGORIES = [
  "phishingLinks",
  "bankAccounts",
  "upiIds",
  "phoneNumbers",
  "referenceIds",
  "emails"
] as const satisfies readonly IntelCategory[];

export type PriorityCategory = (typeof PRIORITY_CATEGORIES)[number];

const CATEGORY_ALIASES: Record<string, IntelCategory> = {
  phoneNumbers: "phoneNumbers",
  phones: "phoneNumbers",
  bankAccounts: "bankAccounts",
  upiIds: "upiIds",
  paymentHandles: "upiIds",
  phishingLinks: "phishingLinks",
  links: "phishingLinks",
  emails: "emails",
  emailAddresses: "emails",
  referenceIds: "referenceIds",
  employeeIds: "referenceIds",
  caseIds: "referenceIds",
  suspiciousKeywords: "suspiciousKeywords"
};

export function emptyIntelligence(): IntelligenceRecord {
  return {
    phoneNumbers: [],
    bankAccounts: [],
    upiIds: [],
    phishingLinks: [],
    emails: [],
    referenceIds: [],
    suspiciousKeywords: []
  };
}

/**
 * Canonical national form of a phone number: digits only, Indian country
 * prefix or trunk zero removed, last ten digits kept.
 */
export function normalizePhone(raw: string): string {
  let digits = raw.replace(/\D/g, "");
  if (digits.length === 12 && digits.startsWith("91")) digits = digits.slice(2);
  else if (digits.length === 11 && digits.startsWith("0")) digits = digits.slice(1);
  if (digits.length > 10) digits = digits.slice(-10);
  return digits;
}

function storedValue(category: IntelCategory, raw: string): string {
  const trimmed = raw.trim();
  if (category === "phoneNumbers") return trimmed ? normalizePhone(trimmed) : "";
  return trimmed;
}

/** Equivalence key used for deduplication within one category. */
export function dedupeKey(category: IntelCategory, value: string): string {
  switch (category) {
    case "phoneNumbers":
      return normalizePhone(value);
    case "upiIds":
    case "emails":
      return value.trim().toLowerCase();
    default:
      return value.trim();
  }
}

/**
 * Unions records category by category. First-seen order wins, equivalent
 * entries are dropped, blanks are skipped.
 */
export function mergeIntelligence(
  ...records: Array<Partial<IntelligenceRecord> | undefined>
): IntelligenceRecord {
  const merged = emptyIntelligence();
  for (const category of INTEL_CATEGORIES) {
    const seen = new Set<string>();
    for (const record of records) {
      const values = record?.[category];
      if (!values) continue;
      for (const raw of values) {
        if (typeof raw !== "string") continue;
        const value = storedValue(category, raw);
        if (!value) continue;
        const key = dedupeKey(category, value);
        if (seen.has(key)) continue;
        seen.add(key);
        merged[category].push(value);
      }
    }
  }
  return merged;
}

export function missingCategories(record: IntelligenceRecord): PriorityCategory[] {
  return PRIORITY_CATEGORIES.filter((category) => record[category].length === 0);
}

export function newEntries(
  category: IntelCategory,
  candidate: readonly string[],
  known: readonly string[]
): string[] {
  const knownKeys = new Set(known.map((value) => dedupeKey(category, value)));
  return candidate.filter((value) => {
    const stored = storedValue(category, value);
    return stored.length > 0 && !knownKeys.has(dedupeKey(category, stored));
  });
}

export function hasNewEntries(
  category: IntelCategory,
  candidate: readonly string[],
  known: readonly string[]
): boolean {
  return newEntries(category, candidate, known).length > 0;
}

export function countEntries(record: IntelligenceRecord): Record<IntelCategory, number> {
  return {
    phoneNumbers: record.phoneNumbers.length,
    bankAccounts: record.bankAccounts.length,
    upiIds: record.upiIds.length,
    phishingLinks: record.phishingLinks.length,
    emails: record.emails.length,
    referenceIds: record.referenceIds.length,
    suspiciousKeywords: record.suspiciousKeywords.length
  };
}

/** Reads an intelligence-shaped object from untrusted output, accepting common field aliases. */
export function coerceIntelligence(value: unknown): IntelligenceRecord {
  const partial: Partial<IntelligenceRecord> = {};
  if (!value || typeof value !== "object") return emptyIntelligence();
  for (const [key, raw] of Object.entries(value)) {
    const category = CATEGORY_ALIASES[key];
    if (!category || !Array.isArray(raw)) continue;
    const strings = raw.filter((item): item is string => typeof item === "string");
    partial[category] = [...(partial[category] ?? []), ...strings];
  }
  return mergeIntelligence(partial);
}
