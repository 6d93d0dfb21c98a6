import type { Validation } from "./model.js";

/**
 * A predicate over captured command output.
 *
 * Implementations hold no per-call state: one validator is attached to many
 * command clones and checked against many outputs.
 */
export interface CommandValidator {
  readonly description: string;
  validate(output: string): boolean;
}

/**
 * Passes when `value` occurs in the output
 */
export function include(value: string): CommandValidator {
  return {
    description: `Include(${value})`,
    validate: (output) => output.includes(value),
  };
}

/**
 * Passes when `value` does not occur in the output
 */
export function exclude(value: string): CommandValidator {
  return {
    description: `Exclude(${value})`,
    validate: (output) => !output.includes(value),
  };
}

/**
 * Validates output against a regex pattern
 */
export function matches(regex: string): CommandValidator {
  const pattern = new RegExp(regex);
  return {
    description: `Matches(${regex})`,
    validate: (output) => pattern.test(output),
  };
}

export function func(
  predicate: (output: string) => boolean,
  description: string
): CommandValidator {
  return {
    description,
    validate: (output) => predicate(output),
  };
}

function validatorFor(spec: Validation): CommandValidator {
  switch (spec.type) {
    case "include":
      return include(spec.value);
    case "exclude":
      return exclude(spec.value);
    case "regex":
      return matches(spec.regex);
  }
}

/**
 * Builds a validator from its plan-file form
 */
export function fromValidationSpec(spec: Validation): CommandValidator {
  const validator = validatorFor(spec);
  if (spec.name) {
    return func((output) => validator.validate(output), spec.name);
  }
  return validator;
}
