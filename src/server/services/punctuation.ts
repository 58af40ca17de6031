// prettier-ignore
const HALF_TO_FULL: Record<string, string> = {
  ',': '，', '.': '。', '?': '？', '!': '！', ':': '：', ';': '；',
  '(': '（', ')': '）', '[': '「', ']': '」', '{': '『', '}': '』',
  '~': '～', '\\': '、', ' ': '　',
};

const FULL_TO_HALF = new Map(Object.entries(HALF_TO_FULL).map(([half, full]) => [full, half]));

/**
 * Resolve a punctuation key in either width to the width the session wants.
 * Returns undefined for characters that are not punctuation keys.
 */
export function toPunctuation(char: string, fullWidth: boolean): string | undefined {
  const full = HALF_TO_FULL[char];
  if (full !== undefined) {
    return fullWidth ? full : char;
  }
  const half = FULL_TO_HALF.get(char);
  if (half !== undefined) {
    return fullWidth ? char : half;
  }
  return undefined;
}
