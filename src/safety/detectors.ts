// src/safety/detectors.ts — Deterministic sensitive-content detectors
//
// Ordered pattern matchers run against model output. Each hit carries a
// confidence: checksum-backed matches (Luhn, IBAN mod-97) that fail their
// checksum are reported as "low", as are loose formats like phone numbers.

import type { CustomPattern, FirewallPolicy } from "../routing/types.js"

// --- Types ---

export type Confidence = "high" | "low"

export interface DetectorHit {
  detector: string
  category: string
  start: number
  end: number
  /** Raw matched span. Never leaves the firewall unmasked. */
  match: string
  confidence: Confidence
}

export interface Detector {
  readonly id: string
  readonly category: string
  detect(text: string): DetectorHit[]
}

// --- Checksums ---

/** Luhn mod-10 over the digits of `value` (separators ignored) */
export function luhnValid(value: string): boolean {
  const digits = value.replace(/\D/g, "")
  if (digits.length < 13 || digits.length > 19) return false
  let sum = 0
  let double = false
  for (let i = digits.length - 1; i >= 0; i--) {
    let d = digits.charCodeAt(i) - 48
    if (double) {
      d *= 2
      if (d > 9) d -= 9
    }
    sum += d
    double = !double
  }
  return sum % 10 === 0
}

/** ISO 13616 mod-97 check */
export function ibanValid(value: string): boolean {
  const compact = value.replace(/\s/g, "").toUpperCase()
  if (compact.length < 15 || compact.length > 34) return false
  const rearranged = compact.slice(4) + compact.slice(0, 4)
  let remainder = 0
  for (const ch of rearranged) {
    const code = ch.charCodeAt(0)
    const chunk = code >= 65 && code <= 90 ? String(code - 55) : ch
    for (const digit of chunk) {
      remainder = (remainder * 10 + Number(digit)) % 97
    }
  }
  return remainder === 1
}

// --- Regex Detector ---

export class RegexDetector implements Detector {
  private pattern: RegExp

  constructor(
    readonly id: string,
    readonly category: string,
    pattern: RegExp,
    private confidence: (match: string) => Confidence = () => "high",
  ) {
    // exec() only advances lastIndex under the global flag
    this.pattern = pattern.global ? pattern : new RegExp(pattern.source, pattern.flags + "g")
  }

  detect(text: string): DetectorHit[] {
    const hits: DetectorHit[] = []
    this.pattern.lastIndex = 0
    let m: RegExpExecArray | null
    while ((m = this.pattern.exec(text)) !== null) {
      if (m[0].length === 0) {
        this.pattern.lastIndex++
        continue
      }
      hits.push({
        detector: this.id,
        category: this.category,
        start: m.index,
        end: m.index + m[0].length,
        match: m[0],
        confidence: this.confidence(m[0]),
      })
    }
    return hits
  }
}

// --- Built-ins ---

const BUILTINS = new Map<string, () => Detector>([
  ["credit_card", () => new RegexDetector(
    "credit_card", "financial",
    /\b(?:\d[ -]?){12,18}\d\b/g,
    m => (luhnValid(m) ? "high" : "low"),
  )],
  ["us_ssn", () => new RegexDetector(
    "us_ssn", "government_id",
    /\b(?!000|666|9\d\d)\d{3}-(?!00)\d{2}-(?!0000)\d{4}\b/g,
  )],
  ["email", () => new RegexDetector(
    "email", "contact",
    /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  )],
  ["phone_number", () => new RegexDetector(
    "phone_number", "contact",
    /(?<![\w+])(?:\+?1[ .-]?)?\(?\d{3}\)?[ .-]\d{3}[ .-]\d{4}\b/g,
    () => "low",
  )],
  ["api_key", () => new RegexDetector(
    "api_key", "credential",
    /\b(?:sk|pk|rk)[-_](?:live|test|proj)[-_][A-Za-z0-9]{16,}\b|\b(?:key|token|secret)=[A-Za-z0-9]{32,}\b/gi,
  )],
  ["aws_access_key", () => new RegexDetector(
    "aws_access_key", "credential",
    /\b(?:AKIA|ASIA)[0-9A-Z]{16}\b/g,
  )],
  ["iban", () => new RegexDetector(
    "iban", "financial",
    /\b[A-Z]{2}\d{2}(?: ?[A-Z0-9]{4}){2,7}(?: ?[A-Z0-9]{1,3})?\b/g,
    m => (ibanValid(m) ? "high" : "low"),
  )],
])

/** Built-in detector ids in their default evaluation order */
export const BUILTIN_DETECTOR_IDS: readonly string[] = [...BUILTINS.keys()]

export function createBuiltinDetector(id: string): Detector {
  const factory = BUILTINS.get(id)
  if (!factory) {
    throw new Error(`Unknown detector "${id}". Known: ${BUILTIN_DETECTOR_IDS.join(", ")}`)
  }
  return factory()
}

export function createCustomDetector(custom: CustomPattern): Detector {
  return new RegexDetector(custom.id, custom.category, new RegExp(custom.pattern, custom.flags ?? ""))
}

/** Ordered chain: configured built-ins first, then custom patterns */
export function buildDetectorChain(firewall: FirewallPolicy): Detector[] {
  return [
    ...firewall.detectors.map(createBuiltinDetector),
    ...firewall.customPatterns.map(createCustomDetector),
  ]
}

/** Run every detector in order; hits are grouped by detector, then by position */
export function runDetectors(chain: readonly Detector[], text: string): DetectorHit[] {
  return chain.flatMap(d => d.detect(text))
}
