/**
 * Provider tag inference from model identifiers.
 */

export const UNKNOWN_PROVIDER = 'unknown';

const NAME_PATTERNS: Array<[RegExp, string]> = [
  [/^(gpt-|o1-|o3-|o4-|text-davinci|text-curie)/, 'openai'],
  [/claude/, 'anthropic'],
  [/^(gemini|palm)/, 'gemini'],
  [/^(mistral|codestral|magistral)/, 'mistral'],
  [/^llama/, 'meta'],
  [/^deepseek/, 'deepseek'],
];

/**
 * Infer the provider tag from a model id.
 * A `provider/model` prefix always wins; otherwise well-known name patterns apply.
 *
 * @returns The provider tag, or 'unknown'.
 */
export function inferProviderFromModel(model: string | null | undefined): string {
  if (!model) {
    return UNKNOWN_PROVIDER;
  }

  const slash = model.indexOf('/');
  if (slash > 0) {
    return model.slice(0, slash);
  }

  const lower = model.toLowerCase();
  for (const [pattern, provider] of NAME_PATTERNS) {
    if (pattern.test(lower)) {
      return provider;
    }
  }

  return UNKNOWN_PROVIDER;
}

/**
 * Pick the provider name for a ledger record: the model id first, then
 * whatever the provider client reported.
 */
export function resolveProviderName(model: string, reported: string | undefined): string {
  const inferred = inferProviderFromModel(model);
  if (inferred !== UNKNOWN_PROVIDER) {
    return inferred;
  }
  return reported && reported.length > 0 ? reported : UNKNOWN_PROVIDER;
}

/** Strip a leading `provider/` prefix: `openrouter/meta-llama/x` -> `meta-llama/x`. */
export function stripProviderPrefix(model: string, provider: string): string {
  const prefix = `${provider}/`;
  return model.startsWith(prefix) ? model.slice(prefix.length) : model;
}
