// src/services/redaction.ts
// What: PII redaction applied to every piece of text before it is persisted.
// How: RegexRedactor runs category rules in a fixed order (cards, government ids, phones, emails, IPs, dates of
//      birth) and replaces each match with a category tag. Cards must run before phones, otherwise a card number
//      is partly taken for a phone number. Tags contain no digits or '@', so re-running is a no-op.

export type RedactionCategory =
  | 'payment-card'
  | 'government-id'
  | 'phone'
  | 'email'
  | 'ip-address'
  | 'date-of-birth';

export interface RedactionReport {
  text: string;
  changed: boolean;
  categories: RedactionCategory[];
}

export interface Redactor {
  redact(text: string): string;
  /** Redacts and reports which categories matched; the report is meant for audit logs only. */
  inspect(text: string): RedactionReport;
  patternsHandled(): string[];
}

interface RedactionRule {
  category: RedactionCategory;
  label: string;
  mask: string;
  patterns: readonly RegExp[];
}

const MONTHS = 'January|February|March|April|May|June|July|August|September|October|November|December';

export const REDACTION_RULES: readonly RedactionRule[] = [
  {
    category: 'payment-card',
    label: 'Payment card numbers',
    mask: '[CARD_REDACTED]',
    patterns: [
      /\b\d{4}[\s-]\d{4}[\s-]\d{4}[\s-]\d{4}\b/g,
      /\b\d{4}[\s-]\d{6}[\s-]\d{5}\b/g, // Amex grouping
      /\b(?:4\d{3}|5[1-5]\d{2}|6011|35\d{2})\d{12}\b/g,
      /\b3[47]\d{13}\b/g,
    ],
  },
  {
    category: 'government-id',
    label: 'Government ID numbers (SSN)',
    mask: '[SSN_REDACTED]',
    patterns: [/\b\d{3}-\d{2}-\d{4}\b/g, /\b\d{9}\b/g],
  },
  {
    category: 'phone',
    label: 'Phone numbers (US & international)',
    mask: '[PHONE_REDACTED]',
    patterns: [
      /(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g,
      /\+\d{1,3}[-.\s]?\(?\d{1,4}\)?[-.\s]?\d{1,4}[-.\s]?\d{1,9}/g,
    ],
  },
  {
    category: 'email',
    label: 'Email addresses',
    mask: '[EMAIL_REDACTED]',
    patterns: [/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+(?:\.[a-zA-Z]{2,})?/g],
  },
  {
    category: 'ip-address',
    label: 'IP addresses (IPv4 & IPv6)',
    mask: '[IP_REDACTED]',
    patterns: [
      /\b(?:\d{1,3}\.){3}\d{1,3}\b/g,
      /\b(?:[0-9a-fA-F]{1,4}:){7}[0-9a-fA-F]{1,4}\b/g,
      /\b(?:[0-9a-fA-F]{1,4}:){1,6}:(?:[0-9a-fA-F]{1,4}(?::[0-9a-fA-F]{1,4}){0,5})?\b/g, // compressed form
    ],
  },
  {
    category: 'date-of-birth',
    label: 'Dates of birth',
    mask: '[DOB_REDACTED]',
    patterns: [
      /\b\d{1,2}\/\d{1,2}\/\d{4}\b/g,
      /\b\d{4}-\d{2}-\d{2}\b/g,
      new RegExp(`\\b(?:${MONTHS})\\s+\\d{1,2},?\\s+\\d{4}\\b`, 'g'),
    ],
  },
];

export class RegexRedactor implements Redactor {
  redact(text: string): string {
    return this.inspect(text).text;
  }

  inspect(text: string): RedactionReport {
    let out = text;
    const categories: RedactionCategory[] = [];
    for (const rule of REDACTION_RULES) {
      const before = out;
      for (const pattern of rule.patterns) {
        out = out.replace(pattern, rule.mask);
      }
      if (out !== before) categories.push(rule.category);
    }
    return { text: out, changed: out !== text, categories };
  }

  containsSensitiveData(text: string): boolean {
    return REDACTION_RULES.some((rule) => rule.patterns.some((p) => text.search(p) !== -1));
  }

  patternsHandled(): string[] {
    return REDACTION_RULES.map((r) => r.label);
  }
}

/** Identity redactor for tests and benchmarks that need unredacted content. */
export class NoopRedactor implements Redactor {
  redact(text: string): string {
    return text;
  }

  inspect(text: string): RedactionReport {
    return { text, changed: false, categories: [] };
  }

  patternsHandled(): string[] {
    return [];
  }
}
