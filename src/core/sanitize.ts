/*
Purpose: redact credentials and personal data from any text before it is logged or shown.
Assumptions: rules run in order; earlier, more specific rules win over the generic assignments.
Usage: sanitize(line), sanitizeJson(payload).
*/

export const REDACTED = "[REDACTED]";

export type RedactionRule = {
  name: string;
  pattern: RegExp;
  // Keeps a leading group (e.g. "password=") and redacts only the value.
  keepPrefix?: boolean;
};

const KEY_BEGIN = "-----BEGIN (?:RSA |EC |DSA |OPENSSH |ENCRYPTED )?PRIVATE KEY-----";
const KEY_END = "-----END (?:RSA |EC |DSA |OPENSSH |ENCRYPTED )?PRIVATE KEY-----";

export const DEFAULT_REDACTION_RULES: readonly RedactionRule[] = [
  { name: "private-key-block", pattern: new RegExp(`${KEY_BEGIN}[\\s\\S]*?${KEY_END}`, "g") },
  { name: "private-key-header", pattern: new RegExp(KEY_BEGIN, "g") },
  { name: "aws-access-key-id", pattern: /(?:AKIA|ASIA)[0-9A-Z]{16}/g },
  {
    name: "aws-secret-access-key",
    pattern: /(aws_secret_access_key\s*[:=]\s*["']?)[^\s"']+/gi,
    keepPrefix: true,
  },
  { name: "github-fine-grained-pat", pattern: /github_pat_[A-Za-z0-9_]{82}/g },
  { name: "github-token", pattern: /gh[pousr]_[A-Za-z0-9]{36}/g },
  {
    name: "bearer-token",
    pattern: /(\bBearer\s+)[A-Za-z0-9\-._~+/]{16,}=*/g,
    keepPrefix: true,
  },
  {
    name: "generic-assignment",
    pattern: /(\b(?:password|passwd|secret|token|api[_-]?key)\s*[:=]\s*["']?)[^\s"',;]{8,}/gi,
    keepPrefix: true,
  },
  {
    name: "email",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  },
];

export function sanitize(
  text: string,
  rules: readonly RedactionRule[] = DEFAULT_REDACTION_RULES,
): string {
  let result = text;
  for (const rule of rules) {
    rule.pattern.lastIndex = 0;
    result = rule.keepPrefix
      ? result.replace(rule.pattern, (_match, prefix: string) => `${prefix}${REDACTED}`)
      : result.replace(rule.pattern, REDACTED);
  }
  return result;
}

export function sanitizeArgv(argv: readonly string[]): string {
  return sanitize(argv.map(quoteArg).join(" "));
}

function quoteArg(arg: string): string {
  return /^[A-Za-z0-9_./:=@%+,-]+$/.test(arg) ? arg : JSON.stringify(arg);
}

// Walks JSON-like data and sanitizes every string leaf; other values pass through.
export function sanitizeJson(value: unknown): unknown {
  if (typeof value === "string") return sanitize(value);
  if (Array.isArray(value)) return value.map((item: unknown) => sanitizeJson(item));
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]: [string, unknown]) => [key, sanitizeJson(item)]),
    );
  }
  return value;
}
