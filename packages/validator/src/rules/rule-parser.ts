/**
 * Rule-chain grammar:
 *
 *   chain := rule ("|" rule)*
 *   rule  := name [":" args] [">" message]
 *
 * The first `>` in a rule token starts a literal override message that runs to
 * the end of the token. Delimiters cannot be escaped.
 */

export interface RuleSpec {
  /** Rule name, the token before the first `:` */
  readonly name: string;
  /** Everything after the first `:`, unsplit; undefined when the rule takes no arguments */
  readonly args: string | undefined;
  /** Arguments split the way the named rule reads them */
  readonly params: readonly string[];
  /** Override message replacing the localized template */
  readonly message: string | undefined;
  /** Rule token without its override message, e.g. `from:1,5` */
  readonly raw: string;
}

export const REQUIRED_RULE = 'required';

const RANGE_RULES = new Set(['from', 'between']);
const LIST_RULES = new Set(['enum', 'mimes', 'image', 'file']);

/**
 * Split the override message off a single rule token.
 */
export function splitOverride(token: string): { rule: string; message: string | undefined } {
  const at = token.indexOf('>');
  if (at === -1) {
    return { rule: token, message: undefined };
  }
  return { rule: token.slice(0, at), message: token.slice(at + 1) };
}

function splitParams(name: string, args: string): string[] {
  if (RANGE_RULES.has(name)) {
    const comma = args.indexOf(',');
    return comma === -1 ? [args] : [args.slice(0, comma), args.slice(comma + 1)];
  }
  if (LIST_RULES.has(name)) {
    return args.split(',');
  }
  if (name === 'unique') {
    const dot = args.indexOf('.');
    return dot === -1 ? [args] : [args.slice(0, dot), args.slice(dot + 1)];
  }
  if (name === 'slice') {
    const colon = args.indexOf(':');
    return colon === -1 ? [args] : [args.slice(0, colon), args.slice(colon + 1)];
  }
  return [args];
}

export function parseRule(token: string): RuleSpec {
  const { rule, message } = splitOverride(token);
  const colon = rule.indexOf(':');

  if (colon === -1) {
    return { name: rule, args: undefined, params: [], message, raw: rule };
  }

  const name = rule.slice(0, colon);
  const args = rule.slice(colon + 1);
  return { name, args, params: splitParams(name, args), message, raw: rule };
}

/**
 * Parse a field's rule chain into rule specs, in declaration order.
 */
export function parseRuleChain(chain: string): RuleSpec[] {
  return chain.split('|').map(parseRule);
}
