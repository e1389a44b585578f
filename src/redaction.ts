export const REDACTED_PLACEHOLDER = "[redacted]" as const;

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

/**
 * Masks a potentially sensitive string value with a static placeholder.
 */
export function redactString(value: string): string {
  return value.length === 0 ? value : REDACTED_PLACEHOLDER;
}

export function redactOptionalString(value: string | undefined): string | undefined {
  return typeof value === "string" ? redactString(value) : value;
}

/**
 * Masks credentials embedded in a URL (`user:pass@`) and any query string,
 * which webhook endpoints commonly use to carry tokens.
 */
export function redactUrlCredentials(url: string): string {
  if (!isNonEmptyString(url)) {
    return url;
  }

  return url
    .replace(/\/\/([^@/?#]*):([^@]*)@/g, (_match, username: string) => {
      return `//${username}:${REDACTED_PLACEHOLDER}@`;
    })
    .replace(/\?[^#]*/, `?${REDACTED_PLACEHOLDER}`);
}

export function redactOptionalUrlCredentials(url: string | undefined): string | undefined {
  if (typeof url !== "string") {
    return url;
  }

  return redactUrlCredentials(url);
}
