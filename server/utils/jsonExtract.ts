import JSON5 from 'json5';

/** Removes a markdown code fence around a model reply. */
export const stripCodeFence = (value: string): string =>
  value.replace(/^```(?:json|json5)?\s*\r?\n?/, '').replace(/```[\s\r\n]*$/, '').trim();

/**
 * Parses the JSON object in an oracle reply. The model is asked for JSON, but
 * a fence or a few words around the object still occur.
 */
export const parseJsonPayload = (rawResponse: string): unknown => {
  const stripped = stripCodeFence(rawResponse);
  const start = stripped.indexOf('{');
  const end = stripped.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new Error(`No JSON payload in response: ${stripped.slice(0, 120)}`);
  }
  return JSON5.parse(stripped.slice(start, end + 1));
};
