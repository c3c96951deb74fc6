/**
 * JSON extraction for LLM replies.
 *
 * Models wrap JSON in code fences, add a sentence of preamble, use curly
 * quotes or leave trailing commas. `extractJson` strips those before
 * `JSON.parse`; it does not try to repair anything else.
 */

import { LLMError } from '../types';

/**
 * Pulls the JSON payload out of a model reply and parses it.
 *
 * @param open - Opening bracket of the expected top-level value
 * @throws LLMError ('invalid_response') if no parseable JSON is found
 */
export function extractJson(response: string, open: '{' | '['): unknown {
  const close = open === '{' ? '}' : ']';

  const codeBlockMatch = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  let candidate = codeBlockMatch ? codeBlockMatch[1].trim() : response.trim();

  if (!candidate.startsWith(open)) {
    const startIdx = candidate.indexOf(open);
    const endIdx = candidate.lastIndexOf(close);
    if (startIdx !== -1 && endIdx > startIdx) {
      candidate = candidate.substring(startIdx, endIdx + 1);
    }
  }

  candidate = candidate
    .replace(/[“”]/g, '"')
    .replace(/,\s*([}\]])/g, '$1');

  try {
    return JSON.parse(candidate);
  } catch (error) {
    throw new LLMError(
      `Model reply is not valid JSON: ${response.substring(0, 100)}`,
      'invalid_response',
      error instanceof Error ? error : undefined
    );
  }
}
