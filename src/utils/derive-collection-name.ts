/**
 * Collection name for an entity class: snake_case, last word pluralized.
 * "OrderDocument" -> "order_documents", "HTTPRequestLog" -> "http_request_logs"
 */
export function deriveCollectionName(className: string): string {
  const words = className
    // acronym followed by a word: "HTTPRequest" -> "HTTP_Request"
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split('_')
    .filter((word) => word.length > 0);

  const last = words.pop();
  if (last === undefined) return className;
  return [...words, pluralize(last)].join('_');
}

const SIBILANT_ENDING = /(s|x|z|ch|sh)$/;

function pluralize(word: string): string {
  if (/[^aeiou]y$/.test(word)) {
    return `${word.slice(0, -1)}ies`;
  }
  return SIBILANT_ENDING.test(word) ? `${word}es` : `${word}s`;
}
