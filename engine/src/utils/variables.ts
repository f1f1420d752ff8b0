/**
 * phpforge Engine — Template Variable Resolution
 *
 * Manifest paths use ${VARIABLE} references (e.g. /etc/php/${PHP_VERSION}/cli/php.ini,
 * ${HOME}/.local/bin). The helper template uses {{VARIABLE}} so it can keep
 * shell ${...} expansions verbatim.
 */

export type VariableMap = Record<string, string>;

const PATH_VARIABLE = /\$\{([A-Z_]+)\}/g;
const TEMPLATE_VARIABLE = /\{\{([A-Z_]+)\}\}/g;

/**
 * Resolve all ${VARIABLE} references in a path string.
 *
 * @throws Error if an unknown variable is referenced
 *
 * @example
 * resolveVariables("/etc/php/${PHP_VERSION}/cli/php.ini", { PHP_VERSION: "8.2" })
 * // → "/etc/php/8.2/cli/php.ini"
 */
export function resolveVariables(input: string, variables: VariableMap): string {
  return input.replace(PATH_VARIABLE, (_match, varName: string) => {
    const value = variables[varName];
    if (value === undefined) {
      throw new Error(
        `Unknown path variable: \${${varName}}. ` +
          `Supported variables: ${Object.keys(variables).join(", ")}`,
      );
    }
    return value;
  });
}

/**
 * List unknown ${VARIABLE} references without resolving anything.
 */
export function validateVariables(input: string, known: string[]): string[] {
  const allowed = new Set(known);
  const errors: string[] = [];

  for (const match of input.matchAll(PATH_VARIABLE)) {
    if (!allowed.has(match[1])) {
      errors.push(`Unknown variable: \${${match[1]}}`);
    }
  }

  return errors;
}

/**
 * Render {{VARIABLE}} placeholders. Unknown placeholders are an error so a
 * typo in the template never reaches a user's profile.
 */
export function renderTemplate(template: string, variables: VariableMap): string {
  return template.replace(TEMPLATE_VARIABLE, (_match, varName: string) => {
    const value = variables[varName];
    if (value === undefined) {
      throw new Error(`Unknown template variable: {{${varName}}}`);
    }
    return value;
  });
}
