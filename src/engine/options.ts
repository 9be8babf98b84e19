import type { OptionSchemaDocument } from '../schemas/documents.js';

import { SchemaTypeError } from '../lib/errors.js';
import type {
  ChoiceOptionSchema,
  OptionSchema,
  OptionValue,
  OptionValueType,
  PlainOptionSchema,
} from '../lib/types.js';
import {
  describeValueType,
  matchesValueType,
  validateTaskOptionId,
} from '../lib/validators.js';

export interface OptionDefinition {
  id: string;
  name: string;
  description: string;
  type: OptionValueType;
  default: unknown;
  choices?: readonly unknown[] | undefined;
}

function assertValueType(
  optionId: string,
  value: unknown,
  type: OptionValueType,
  role: string
): OptionValue {
  if (!matchesValueType(value, type)) {
    throw new SchemaTypeError(
      `Option '${optionId}' ${role} has type ${describeValueType(value)}, expected ${type}`
    );
  }
  return value;
}

function assertInChoices(
  optionId: string,
  value: OptionValue,
  choices: readonly OptionValue[],
  role: string
): void {
  if (choices.includes(value)) {
    return;
  }
  throw new SchemaTypeError(
    `Option '${optionId}' ${role} ${JSON.stringify(value)} is not one of the allowed choices ${JSON.stringify(choices)}`
  );
}

export function createOption(definition: OptionDefinition): OptionSchema {
  const id = validateTaskOptionId(definition.id);
  const defaultValue = assertValueType(
    id,
    definition.default,
    definition.type,
    'default'
  );
  const base = {
    id,
    name: definition.name,
    description: definition.description,
    type: definition.type,
    default: defaultValue,
  };

  if (definition.choices === undefined) {
    const plain: PlainOptionSchema = { ...base, variant: 'plain' };
    return Object.freeze(plain);
  }

  if (definition.choices.length === 0) {
    throw new SchemaTypeError(`Option '${id}' declares an empty choice set`);
  }
  const choices = definition.choices.map((choice) =>
    assertValueType(id, choice, definition.type, 'choice')
  );
  assertInChoices(id, defaultValue, choices, 'default');

  const choice: ChoiceOptionSchema = {
    ...base,
    variant: 'choice',
    choices: Object.freeze(choices),
  };
  return Object.freeze(choice);
}

/** Type-check a resolved value against the option's schema. */
export function validateOptionValue(
  option: OptionSchema,
  value: unknown
): OptionValue {
  const validated = assertValueType(option.id, value, option.type, 'value');
  if (option.variant === 'choice') {
    assertInChoices(option.id, validated, option.choices, 'value');
  }
  return validated;
}

export function optionToSchema(option: OptionSchema): OptionSchemaDocument {
  const document: OptionSchemaDocument = {
    id: option.id,
    name: option.name,
    description: option.description,
    type: option.type,
    default: option.default,
  };
  if (option.variant === 'choice') {
    document.choices = [...option.choices];
  }
  return document;
}

export function optionFromSchema(document: OptionSchemaDocument): OptionSchema {
  // Older contracts name the floating point type "float".
  const type = document.type === 'float' ? 'number' : document.type;
  return createOption({
    id: document.id,
    name: document.name,
    description: document.description,
    type,
    default: document.default,
    choices: document.choices ?? undefined,
  });
}
