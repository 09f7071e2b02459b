/**
 * Placeholder substitution for announcement templates.
 *
 * `$name` and `${name}` are replaced by the variable's value, `$$` yields a
 * literal `$`. A `$` followed by anything else is kept as written.
 *
 * @module
 */

import { ErrorCode, TemplateError } from "../errors.js";

export type TemplateValue = string | number | boolean;

export type TemplateVariables = Readonly<Record<string, TemplateValue>>;

const PLACEHOLDER = /\$(?:(\$)|([_a-zA-Z][_a-zA-Z0-9]*)|\{([_a-zA-Z][_a-zA-Z0-9]*)\})/g;

/**
 * Names referenced by the template, in order of first appearance
 */
export function listPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[2] ?? match[3];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * @throws {TemplateError} when a referenced variable has no value
 */
export function substitute(template: string, variables: TemplateVariables, templateName = "<inline>"): string {
  return template.replace(PLACEHOLDER, (_match: string, escaped?: string, bare?: string, braced?: string) => {
    if (escaped !== undefined) {
      return "$";
    }
    const name = bare ?? braced ?? "";
    const value = Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : undefined;
    if (value === undefined) {
      throw new TemplateError(
        `Missing value for "${name}" in template ${templateName}`,
        ErrorCode.TEMPLATE_MISSING_VARIABLE,
        { templateName, variable: name }
      );
    }
    return String(value);
  });
}
