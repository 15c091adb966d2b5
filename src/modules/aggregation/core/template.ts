/**
 * Naming and quantity templates.
 *
 * Templates reference placeholders as `{name}`. Only the placeholders listed in
 * TEMPLATE_PLACEHOLDERS exist; anything else is rejected when the template is declared.
 * Literal braces are written doubled, as in `'{{open}}'::text[]`.
 */

import { AggregationConfigError } from './errors.js';
import {
  TEMPLATE_PLACEHOLDERS,
  type DatePlaceholder,
  type TemplatePlaceholder,
  type TemplateValues,
} from './types.js';

const PLACEHOLDER_PATTERN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const isTemplatePlaceholder = (name: string): name is TemplatePlaceholder =>
  TEMPLATE_PLACEHOLDERS.some((placeholder) => placeholder === name);

const isDatePlaceholder = (name: TemplatePlaceholder): name is DatePlaceholder =>
  name === 'collate_date' || name === 'collate_interval';

/**
 * Lists the placeholder names referenced by a template, in order of appearance.
 */
export const findPlaceholders = (template: string): string[] =>
  [...template.matchAll(PLACEHOLDER_PATTERN)].flatMap((match) =>
    match[1] !== undefined ? [match[1]] : []
  );

/**
 * Doubles the braces of literal text so a template keeps it verbatim.
 */
export const escapeTemplate = (text: string): string =>
  text.replaceAll('{', '{{').replaceAll('}', '}}');

/**
 * Checks a template against the placeholders allowed for its role.
 *
 * @returns The date placeholders the template needs values for
 * @throws AggregationConfigError on any other placeholder
 */
export const checkTemplate = (
  template: string,
  allowed: readonly TemplatePlaceholder[],
  field: string
): Set<DatePlaceholder> => {
  const used = new Set<DatePlaceholder>();

  for (const name of findPlaceholders(template)) {
    if (!isTemplatePlaceholder(name) || !allowed.includes(name)) {
      throw new AggregationConfigError(
        `Unknown placeholder {${name}} in ${field} template '${template}' (allowed: ${allowed.join(', ')})`,
        field,
        { template, placeholder: name }
      );
    }
    if (isDatePlaceholder(name)) {
      used.add(name);
    }
  }

  return used;
};

/**
 * Substitutes placeholder values into a checked template.
 *
 * @throws AggregationConfigError when a referenced placeholder has no value
 */
export const fillTemplate = (template: string, values: TemplateValues): string =>
  template.replace(PLACEHOLDER_PATTERN, (match: string, name: string | undefined) => {
    if (name === undefined) {
      return match.charAt(0);
    }
    const value = isTemplatePlaceholder(name) ? values[name] : undefined;
    if (value === undefined) {
      throw new AggregationConfigError(
        `No value for placeholder ${match} in '${template}'`,
        'format',
        { template, placeholder: name }
      );
    }
    return value;
  });
