/**
 * Resource Naming
 *
 * Pure, locale-independent inflection used to derive route names, path
 * segments and nested parameter names. Only the last word of a snake_case
 * name is inflected: `admin_person` -> `admin_people`.
 */

import { snakeCase } from 'es-toolkit/compat';

type Rule = readonly [pattern: RegExp, replacement: string];

const IRREGULARS: ReadonlyArray<readonly [singular: string, plural: string]> = [
  ['person', 'people'],
  ['man', 'men'],
  ['woman', 'women'],
  ['child', 'children'],
  ['mouse', 'mice'],
  ['ox', 'oxen'],
  ['foot', 'feet'],
  ['tooth', 'teeth'],
];

const UNCOUNTABLES = new Set([
  'equipment',
  'information',
  'rice',
  'money',
  'species',
  'series',
  'fish',
  'sheep',
  'news',
  'metadata',
]);

// First match wins
const PLURAL_RULES: readonly Rule[] = [
  [/(quiz)$/, '$1zes'],
  [/(matr|vert|ind)(?:ix|ex)$/, '$1ices'],
  [/(bu|alia|statu)s$/, '$1ses'],
  [/(x|ch|ss|sh)$/, '$1es'],
  [/([^aeiouy]|qu)y$/, '$1ies'],
  [/(?:([^f])fe|([lr])f)$/, '$1$2ves'],
  [/sis$/, 'ses'],
  [/s$/, 's'],
  [/$/, 's'],
];

const SINGULAR_RULES: readonly Rule[] = [
  [/(quiz)zes$/, '$1'],
  [/(matr)ices$/, '$1ix'],
  [/(vert|ind)ices$/, '$1ex'],
  [/(bus|alias|status)(?:es)?$/, '$1'],
  [/(analy|ba|diagno|parenthe|progno|synop|the)ses$/, '$1sis'],
  [/(x|ch|ss|sh)es$/, '$1'],
  [/([^aeiouy]|qu)ies$/, '$1y'],
  [/([lr])ves$/, '$1f'],
  [/([^f])ves$/, '$1fe'],
  [/ss$/, 'ss'],
  [/s$/, ''],
];

const splitLastWord = (word: string): [head: string, last: string] => {
  const index = word.lastIndexOf('_');
  return index === -1 ? ['', word] : [word.slice(0, index + 1), word.slice(index + 1)];
};

const applyRules = (word: string, rules: readonly Rule[]): string => {
  const rule = rules.find(([pattern]) => pattern.test(word));
  return rule ? word.replace(rule[0], rule[1]) : word;
};

const inflect = (
  word: string,
  irregular: (entry: readonly [string, string]) => [from: string, to: string],
  rules: readonly Rule[],
): string => {
  const [head, last] = splitLastWord(word);
  if (last === '' || UNCOUNTABLES.has(last)) {
    return word;
  }

  for (const entry of IRREGULARS) {
    const [from, to] = irregular(entry);
    if (last === from || last === to) {
      return `${head}${to}`;
    }
  }

  return `${head}${applyRules(last, rules)}`;
};

/**
 * Plural form of a snake_case name. Already plural names are returned as-is.
 */
export const pluralize = (word: string): string =>
  inflect(word, ([singular, plural]) => [singular, plural], PLURAL_RULES);

/**
 * Singular form of a snake_case name
 */
export const singularize = (word: string): string =>
  inflect(word, ([singular, plural]) => [plural, singular], SINGULAR_RULES);

/**
 * `AdminUsers` / `admin-users` / `adminUsers` -> `admin_users`
 */
export const underscore = (word: string): string => snakeCase(word);
