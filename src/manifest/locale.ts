/** CJK Unified Ideographs. */
export const CJK_IDEOGRAPHS = /[\u4e00-\u9fff]/;

export function containsScript(pattern: RegExp, ...values: (string | null | undefined)[]): boolean {
  return values.some((value) => !!value && pattern.test(value));
}

export function containsCjk(...values: (string | null | undefined)[]): boolean {
  return containsScript(CJK_IDEOGRAPHS, ...values);
}
