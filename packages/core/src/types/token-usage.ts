/**
 * Token usage as reported by the agent on turn.completed.
 *
 * Uses snake_case to match the agent's event payloads.
 */
export interface TokenUsage {
  input_tokens?: number;
  output_tokens?: number;
  total_tokens?: number;
  cache_read_tokens?: number;
}
