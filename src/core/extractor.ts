import { DEFAULT_KEYWORDS, KeywordTables } from "../utils/config";
import { IntelligenceRecord, mergeIntelligence, normalizePhone } from "./intel";

export type Register = "english" | "hinglish";

export type MessageSignals = {
  bank: string | null;
  account: boolean;
  credentials: boolean;
  link: boolean;
  payment: boolean;
  urgency: boolean;
  authority: boolean;
  claimedName: string | null;
};

const fullUrlRegex = /https?:\/\/[^\s'"<>]+/gi;
const bareUrlRegexes = [
  /\bwww\.[^\s'"<>]+/gi,
  /\bbit\.ly\/[^\s'"<>]+/gi,
  /\btinyurl\.com\/[^\s'"<>]+/gi
];
const atTokenRegex = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+/g;
const tldSuffixRegex = /\.[A-Za-z]{2,}$/;
const phoneRegex = /(?<!\d)(?:\+?91[\s-]?|0)?[6-9]\d{4}[\s-]?\d{5}(?!\d)/g;
const accountRegex = /(?<!\d)\d{9,18}(?!\d)/g;
const prefixedIdRegex =
  /\b(?:REF|EMP|CASE|TKT|TXN|CMP|FIR|SBI|RBI|ITA|FPC|JIO)[-#]?[A-Z0-9][A-Z0-9-]{2,24}\b/gi;
const labelledIdRegex =
  /\b(?:employee|emp|staff|badge|officer|case|ref|reference|ticket|complaint)(?:\s+(?:id|code|no\.?|number))?\s*(?:[:#]\s*|\s+(?:is\s+)?)([A-Za-z0-9][A-Za-z0-9-]{2,24})\b/gi;
const claimedNameRegex = /(?:\b[Mm]rs?\.?|\b[Tt]his is|\bI am|\bI'm|\b[Mm]y name is)\s+([A-Z][a-z]+)\b/;

const NOT_A_NAME = new Set(["from", "calling", "the", "your", "bank", "sir", "madam", "here", "urgent", "officer"]);

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive term match that respects word edges on alphanumeric ends. */
export function containsTerm(haystack: string, term: string): boolean {
  const lowerTerm = term.toLowerCase();
  const before = /^[a-z0-9]/.test(lowerTerm) ? "(?<![a-z0-9])" : "";
  const after = /[a-z0-9]$/.test(lowerTerm) ? "(?![a-z0-9])" : "";
  return new RegExp(`${before}${escapeRegex(lowerTerm)}${after}`).test(haystack.toLowerCase());
}

function cleanUrl(url: string): string {
  return url.replace(/[.,;:!?)'"\]}]+$/g, "").trim();
}

function hasTld(domain: string): boolean {
  return tldSuffixRegex.test(domain);
}

/**
 * Splits an `local@domain` token into a payment handle or an email. The only
 * discriminator is the domain: a recognised TLD suffix makes it an email.
 */
export function classifyAtToken(token: string): "upi" | "email" | null {
  const at = token.indexOf("@");
  if (at <= 0 || at === token.length - 1) return null;
  const domain = token.slice(at + 1).replace(/\.+$/g, "");
  if (!domain) return null;
  return hasTld(domain) ? "email" : "upi";
}

function matchAll(text: string, regex: RegExp): string[] {
  return Array.from(text.matchAll(regex), (m) => m[0]);
}

function blank(text: string, spans: string[]): string {
  let out = text;
  for (const span of spans) out = out.split(span).join(" ");
  return out;
}

function isValidReferenceId(value: string, excludedParts: Set<string>): boolean {
  const v = value.trim();
  if (v.length < 4) return false;
  if (!/\d/.test(v)) return false;
  if (/^\d+$/.test(v) && v.length >= 9) return false;
  return !excludedParts.has(v.toLowerCase());
}

export function extractIntelligence(
  texts: string[],
  tables: KeywordTables = DEFAULT_KEYWORDS
): IntelligenceRecord {
  const combined = texts.filter((t) => typeof t === "string").join(" \n ");

  const fullUrls = matchAll(combined, fullUrlRegex);
  let rest = blank(combined, fullUrls);
  const bareUrls = bareUrlRegexes.flatMap((regex) => matchAll(rest, regex));
  rest = blank(rest, bareUrls);
  const links = [...fullUrls, ...bareUrls].map(cleanUrl).filter(Boolean);

  const upiIds: string[] = [];
  const emails: string[] = [];
  for (const raw of matchAll(rest, atTokenRegex)) {
    const token = raw.replace(/\.+$/g, "");
    const kind = classifyAtToken(token);
    if (kind === "email") emails.push(token);
    else if (kind === "upi") upiIds.push(token);
  }
  rest = blank(rest, matchAll(rest, atTokenRegex));

  const phones = matchAll(rest, phoneRegex);
  const phoneDigits = new Set(phones.map(normalizePhone));

  const bankAccounts = matchAll(rest, accountRegex).filter((digits) => {
    if (digits.length === 13) return false;
    if (digits.length <= 12 && phoneDigits.has(normalizePhone(digits))) return false;
    return true;
  });

  const excludedParts = new Set<string>();
  for (const link of links) {
    for (const part of link.toLowerCase().split(/[/:.?&=#]+/)) excludedParts.add(part);
  }
  for (const handle of [...upiIds, ...emails]) {
    for (const part of handle.toLowerCase().split(/[@.]+/)) excludedParts.add(part);
  }
  const referenceIds = [
    ...matchAll(rest, prefixedIdRegex),
    ...Array.from(rest.matchAll(labelledIdRegex), (m) => m[1] ?? "")
  ].filter((value) => isValidReferenceId(value, excludedParts));

  const suspiciousKeywords = tables.suspicious.filter((kw) => containsTerm(combined, kw));

  return mergeIntelligence({
    phoneNumbers: phones,
    bankAccounts,
    upiIds,
    phishingLinks: links,
    emails,
    referenceIds,
    suspiciousKeywords
  });
}

export function messageSignals(text: string, tables: KeywordTables = DEFAULT_KEYWORDS): MessageSignals {
  const lower = text.toLowerCase();
  const has = (terms: string[]) => terms.some((term) => containsTerm(lower, term));
  const bank = tables.signals.banks.find((name) => containsTerm(lower, name)) ?? null;
  const nameMatch = claimedNameRegex.exec(text);
  const rawName = nameMatch?.[1]?.toLowerCase() ?? "";
  const claimedName =
    rawName && !NOT_A_NAME.has(rawName) ? rawName.charAt(0).toUpperCase() + rawName.slice(1) : null;

  return {
    bank,
    account: has(tables.signals.accounts),
    credentials: has(tables.signals.credentials),
    link: has(tables.signals.links),
    payment: has(tables.signals.paymentApps),
    urgency: has(tables.signals.urgency),
    authority: has(tables.signals.authority),
    claimedName
  };
}

export function detectRegister(
  text: string,
  language?: string,
  tables: KeywordTables = DEFAULT_KEYWORDS
): Register {
  if (language && /hindi|hinglish/i.test(language)) return "hinglish";
  const markers = tables.hinglishMarkers.filter((word) => containsTerm(text, word));
  return markers.length >= 2 ? "hinglish" : "english";
}
