/**
 * outline-porter - Code Fence Vault
 *
 * Swaps triple-backtick blocks out for opaque tokens before line-level
 * processing and puts them back afterwards, byte for byte.
 *
 * @module core/code-fence-vault
 */

/**
 * Ordered mapping from placeholder token to the original fenced block
 * (delimiters included). Insertion order is discovery order.
 */
export type FenceVault = Map<string, string>;

/** Result of {@link extractCodeFences}. */
export interface FenceExtraction {
  /** Text with every fenced block replaced by its token. */
  text: string;

  /** Tokens and the blocks they stand for. */
  vault: FenceVault;
}

// Non-greedy: each opener pairs with the nearest closer. An odd trailing
// fence has no closer and is left in place as ordinary text.
const CODE_FENCE_RE = /```[\s\S]*?```/g;

// NUL never survives into pasted prose, so the prefix cannot collide.
const PLACEHOLDER_RE = /\x00CODEBLOCK(\d+)\x00/g;

/**
 * Build the placeholder token for the `index`-th extracted block.
 */
export function placeholderToken(index: number): string {
  return `\x00CODEBLOCK${index}\x00`;
}

/**
 * Replace every fenced code block with a placeholder token.
 *
 * Numbering restarts at zero on every call; the returned vault belongs to
 * the caller's conversion only.
 *
 * @param text - Normalized text.
 * @returns The tokenized text and the vault needed to restore it.
 */
export function extractCodeFences(text: string): FenceExtraction {
  const vault: FenceVault = new Map();
  const tokenized = text.replace(CODE_FENCE_RE, (match) => {
    const token = placeholderToken(vault.size);
    vault.set(token, match);
    return token;
  });
  return { text: tokenized, vault };
}

/**
 * Put extracted blocks back in a single pass over the token grammar.
 *
 * Tokens that are not in the vault are left as they are.
 *
 * @param text - Text containing placeholder tokens.
 * @param vault - Vault produced by the matching {@link extractCodeFences} call.
 * @returns Text with the original blocks restored.
 */
export function restoreCodeFences(text: string, vault: FenceVault): string {
  if (vault.size === 0) return text;
  return text.replace(PLACEHOLDER_RE, (token) => vault.get(token) ?? token);
}

// JSON.stringify writes NUL as the six-character escape `\u0000`.
const JSON_PLACEHOLDER_RE = /\\u0000CODEBLOCK(\d+)\\u0000/g;

/**
 * Restore extracted blocks inside a JSON document.
 *
 * The blocks are written as JSON string content (quotes, backslashes and
 * newlines escaped), so the result still parses and each parsed string
 * holds the original block verbatim.
 *
 * @param json - Output of `JSON.stringify` over data containing tokens.
 * @param vault - Vault produced by the matching {@link extractCodeFences} call.
 */
export function restoreCodeFencesInJson(json: string, vault: FenceVault): string {
  if (vault.size === 0) return json;
  return json.replace(JSON_PLACEHOLDER_RE, (escaped, idx: string) => {
    const block = vault.get(placeholderToken(parseInt(idx, 10)));
    return block === undefined ? escaped : JSON.stringify(block).slice(1, -1);
  });
}
