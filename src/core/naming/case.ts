/**
 * Word splitting and case conversion for generated file stems and identifiers.
 */

export const CASE_STYLES = ['snake_case', 'kebab-case', 'camelCase', 'PascalCase', 'UPPER_CASE'] as const;

export type CaseStyle = (typeof CASE_STYLES)[number];

/**
 * Regex bodies (unanchored) matching each case style.
 */
const CASE_PATTERNS: Record<CaseStyle, string> = {
  PascalCase: '[A-Z][a-zA-Z0-9]*',
  camelCase: '[a-z][a-zA-Z0-9]*',
  snake_case: '[a-z][a-z0-9]*(?:_[a-z0-9]+)*',
  UPPER_CASE: '[A-Z][A-Z0-9]*(?:_[A-Z0-9]+)*',
  'kebab-case': '[a-z][a-z0-9]*(?:-[a-z0-9]+)*',
};

const CASE_EXAMPLES: Record<CaseStyle, string> = {
  PascalCase: 'OrderItem',
  camelCase: 'orderItem',
  snake_case: 'order_item',
  UPPER_CASE: 'ORDER_ITEM',
  'kebab-case': 'order-item',
};

/**
 * Split an identifier in any common style into lowercase words.
 *
 * @example
 * splitWords('OrderItemService') // ['order', 'item', 'service']
 * splitWords('user_profile-v2')  // ['user', 'profile', 'v2']
 * splitWords('HTTPClient')       // ['http', 'client']
 */
export function splitWords(input: string): string[] {
  return input
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.toLowerCase());
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Join lowercase words in the given style.
 */
export function toCase(words: string[], style: CaseStyle): string {
  switch (style) {
    case 'snake_case':
      return words.join('_');
    case 'kebab-case':
      return words.join('-');
    case 'UPPER_CASE':
      return words.map((w) => w.toUpperCase()).join('_');
    case 'PascalCase':
      return words.map(capitalize).join('');
    case 'camelCase':
      return words.map((w, i) => (i === 0 ? w : capitalize(w))).join('');
  }
}

/**
 * Re-case an identifier: `convertCase('order item', 'PascalCase')` → `OrderItem`.
 */
export function convertCase(input: string, style: CaseStyle): string {
  return toCase(splitWords(input), style);
}

/**
 * Check whether a whole name is written in the given style.
 */
export function matchesCase(name: string, style: CaseStyle): boolean {
  return new RegExp(`^${CASE_PATTERNS[style]}$`).test(name);
}

/**
 * Human-readable description used in violation messages.
 */
export function describeCase(style: CaseStyle): string {
  return `${style} (e.g. ${CASE_EXAMPLES[style]})`;
}
