/**
 * Text helpers shared by the client, aggregator and tool handlers.
 */

const HTML_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

/**
 * Remove HTML tags from rich-text work item fields and decode the common entities.
 */
export function stripHtml(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/&(nbsp|amp|lt|gt|quot|#39);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .trim();
}

/**
 * Escape a value for safe inclusion in a WIQL query string.
 * WIQL uses single-quoted string literals; embedded single quotes are doubled.
 */
export function escapeWiqlValue(value: string): string {
  return value.replace(/'/g, "''");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove a PAT and its base64-encoded Basic form from arbitrary text.
 */
export function redactSecret(text: string, secret: string | undefined): string {
  if (!secret) {
    return text;
  }

  let sanitized = text;
  if (sanitized.includes(secret)) {
    sanitized = sanitized.replace(new RegExp(escapeRegExp(secret), 'g'), '[PAT_REDACTED]');
  }

  const base64Secret = Buffer.from(`:${secret}`).toString('base64');
  if (sanitized.includes(base64Secret)) {
    sanitized = sanitized.replace(new RegExp(escapeRegExp(base64Secret), 'g'), '[PAT_BASE64_REDACTED]');
  }

  return sanitized;
}

export function truncate(text: string, maxLength = 1000): string {
  return text.length > maxLength ? text.substring(0, maxLength) + '... [truncated]' : text;
}
