import Ajv, { ErrorObject } from 'ajv';

export const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

/** Recursive FieldMap schema, referenced as `fieldMap` */
ajv.addSchema({
  $id: 'fieldMap',
  type: 'object',
  additionalProperties: {
    anyOf: [{ type: ['string', 'number', 'boolean', 'null'] }, { $ref: 'fieldMap' }],
  },
});

export function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'invalid value';
  return errors.map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ');
}
