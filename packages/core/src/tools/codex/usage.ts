import type { TokenUsage } from '../../types/token-usage';

function normalizeNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Normalize the usage block of a Codex `turn.completed` event:
 * {
 *   input_tokens,
 *   output_tokens,
 *   cached_input_tokens
 * }
 *
 * cached_input_tokens maps to cache_read_tokens.
 */
export function extractCodexTokenUsage(raw: unknown): TokenUsage | undefined {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return undefined;
  }

  const payload = new Map(Object.entries(raw));
  const inputTokens = normalizeNumber(payload.get('input_tokens'));
  const outputTokens = normalizeNumber(payload.get('output_tokens'));
  const cacheReadTokens = normalizeNumber(payload.get('cached_input_tokens'));

  if (inputTokens === undefined && outputTokens === undefined && cacheReadTokens === undefined) {
    return undefined;
  }

  return {
    input_tokens: inputTokens,
    output_tokens: outputTokens,
    cache_read_tokens: cacheReadTokens,
    total_tokens: (inputTokens ?? 0) + (outputTokens ?? 0),
  };
}

/**
 * Tokens billed for a turn: input + output. Cached input is already part of
 * input_tokens and is not added again.
 */
export function countTurnTokens(raw: unknown): number | undefined {
  return extractCodexTokenUsage(raw)?.total_tokens;
}
