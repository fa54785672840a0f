import {
  TEMPLATE_VARIABLES,
  type GatewayTemplateVariables,
  type TemplateVariableName,
} from '@hostgate/shared';

import { GatewayConfigError } from '../core/errors.js';
import { assertInstallDir, assertValidHostname } from '../core/host-validation.js';

const VARIABLE_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const isTemplateVariable = (name: string): name is TemplateVariableName =>
  TEMPLATE_VARIABLES.some((variable) => variable === name);

const validators: Record<TemplateVariableName, (value: string) => string> = {
  NODE_HOST: (value) => assertValidHostname(value, 'NODE_HOST'),
  INSTALL_DIR: (value) => assertInstallDir(value, 'INSTALL_DIR'),
};

/** Declared variables the template references, in declaration order. */
export const findTemplateVariables = (template: string): TemplateVariableName[] =>
  TEMPLATE_VARIABLES.filter((name) => template.includes(`\${${name}}`));

/**
 * Resolve `${NODE_HOST}` and `${INSTALL_DIR}` in an nginx template. Any other
 * `$name` or `${name}` is nginx's own variable syntax and is left as written.
 */
export const substituteTemplateVariables = (
  template: string,
  variables: Partial<GatewayTemplateVariables>,
): string => {
  const referenced = findTemplateVariables(template);
  const missing = referenced.filter((name) => !variables[name]?.trim());
  if (missing.length > 0) {
    throw new GatewayConfigError(
      'Template variables are not set',
      missing.map((name) => `${name} is required`),
    );
  }

  const resolved = new Map<TemplateVariableName, string>();
  for (const name of referenced) {
    resolved.set(name, validators[name](variables[name] ?? ''));
  }

  return template.replace(VARIABLE_REFERENCE, (match: string, name: string) =>
    isTemplateVariable(name) ? (resolved.get(name) ?? match) : match,
  );
};
