export const REDACTED = '[REDACTED]';

/**
 * Patterns that catch credentials we were never told about: inline
 * `password=` style assignments, URL-embedded passwords and bearer tokens.
 */
const SENSITIVE_PATTERNS = [
  /((?:password|passwd|pwd|secret|token|api[-_]?key)[:=]\s*['"]?)([^\s'"]+)/gi,
  /((?:postgres|mysql|mongodb|redis|https?):\/\/[^:/\s]+:)([^@\s]+)(?=@)/gi,
  /(Bearer\s+)([A-Za-z0-9\-._~+/]+=*)/g,
];

export class SecretRedactor {
  private readonly secrets = new Set<string>();

  register(value: string): void {
    if (value.length > 0) {
      this.secrets.add(value);
    }
  }

  registerAll(values: Iterable<string>): void {
    for (const value of values) {
      this.register(value);
    }
  }

  get size(): number {
    return this.secrets.size;
  }

  redact(text: string): string {
    let redacted = text;

    // Longest first, so a secret that contains a shorter one is replaced whole.
    const known = Array.from(this.secrets).sort((a, b) => b.length - a.length);
    for (const secret of known) {
      redacted = redacted.split(secret).join(REDACTED);
    }

    for (const pattern of SENSITIVE_PATTERNS) {
      // Each pattern captures the lead-in and the value separately; only the value is masked.
      redacted = redacted.replace(pattern, (_match, prefix: string) => `${prefix}${REDACTED}`);
    }

    return redacted;
  }
}
